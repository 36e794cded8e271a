import test from 'node:test';
import assert from 'node:assert/strict';
import { gunzipSync } from 'node:zlib';
import { encodeUtf8 } from '../src/binary.js';
import { CompressionError, compress, decompress } from '../src/compress/index.js';

const input = encodeUtf8('coffer-compress-test-'.repeat(1024));

test('gzip round trip', async () => {
  const packed = await compress(input);
  assert.equal(packed[0], 0x1f);
  assert.equal(packed[1], 0x8b);
  assert.ok(packed.length < input.length);
  assert.deepEqual(await decompress(packed), input);
});

test('output is plain gzip', async () => {
  const packed = await compress(input, { level: 9 });
  assert.deepEqual(new Uint8Array(gunzipSync(packed)), input);
});

test('async iterable sources and small chunks', async () => {
  async function* pieces(): AsyncGenerator<Uint8Array> {
    for (let offset = 0; offset < input.length; offset += 1000) {
      yield input.subarray(offset, offset + 1000);
    }
  }
  const packed = await compress(pieces(), { chunkSize: 7 });
  assert.deepEqual(await decompress(packed, { chunkSize: 5 }), input);
});

test('empty input round-trips', async () => {
  const packed = await compress(new Uint8Array(0));
  assert.deepEqual(await decompress(packed), new Uint8Array(0));
});

test('corrupt input maps to COMPRESSION_BAD_DATA', async () => {
  await assert.rejects(decompress(encodeUtf8('definitely not gzip')), (err: unknown) => {
    assert.ok(err instanceof CompressionError);
    assert.equal(err.code, 'COMPRESSION_BAD_DATA');
    assert.equal(err.toJSON().algorithm, 'gzip');
    return true;
  });
});

test('truncated gzip maps to COMPRESSION_BAD_DATA', async () => {
  const packed = await compress(input);
  await assert.rejects(
    decompress(packed.subarray(0, packed.length - 12)),
    (err: unknown) => err instanceof CompressionError && err.code === 'COMPRESSION_BAD_DATA'
  );
});

test('output limit maps to COMPRESSION_RESOURCE_LIMIT', async () => {
  const packed = await compress(new Uint8Array(200_000));
  await assert.rejects(decompress(packed, { maxOutputBytes: 1000 }), (err: unknown) => {
    assert.ok(err instanceof CompressionError);
    assert.equal(err.code, 'COMPRESSION_RESOURCE_LIMIT');
    assert.deepEqual(err.context, { maxOutputBytes: '1000' });
    return true;
  });
});

test('pre-aborted signal rejects with its reason', async () => {
  const controller = new AbortController();
  const reason = new Error('cancelled');
  controller.abort(reason);
  await assert.rejects(compress(input, { signal: controller.signal }), (err: unknown) => err === reason);
  const packed = await compress(input);
  await assert.rejects(decompress(packed, { signal: controller.signal }), (err: unknown) => err === reason);
});
