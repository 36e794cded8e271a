import test from 'node:test';
import assert from 'node:assert/strict';
import { ArchiveError } from '../src/archive/errors.js';
import { encodeUtf8, decodeUtf8 } from '../src/binary.js';
import { BufferSink } from '../src/io/Sink.js';
import { TarReader } from '../src/tar/TarReader.js';
import { TarWriter } from '../src/tar/TarWriter.js';
import type { TarWriterOptions } from '../src/tar/types.js';

const FIXED_MTIME = new Date(1_600_000_000_000);

async function writeTar(
  entries: Array<{ name: string; data?: Uint8Array; mtime?: Date }>,
  options?: TarWriterOptions
): Promise<Uint8Array> {
  const sink = new BufferSink();
  const writer = TarWriter.toSink(sink, options);
  for (const entry of entries) {
    await writer.add(entry.name, entry.data, { mtime: entry.mtime ?? FIXED_MTIME });
  }
  await writer.close();
  return sink.toUint8Array();
}

test('files and directories round trip', async () => {
  const mtime = new Date(1_700_000_000_000);
  const archive = await writeTar([
    { name: 'docs/', mtime },
    { name: 'docs/a.json', data: encodeUtf8('[1,2]'), mtime }
  ]);
  assert.equal(archive.length % 512, 0);
  const reader = await TarReader.fromUint8Array(archive);
  const entries = reader.entries();
  assert.deepEqual(
    entries.map((entry) => [entry.name, entry.type, entry.size]),
    [
      ['docs/', 'directory', 0n],
      ['docs/a.json', 'file', 5n]
    ]
  );
  assert.equal(entries[0]?.isDirectory, true);
  assert.deepEqual(entries[1]?.mtime, mtime);
  assert.equal(decodeUtf8(reader.read(entries[1]!)), '[1,2]');
});

test('deterministic mode zeroes timestamps', async () => {
  const archive = await writeTar([{ name: 'a.txt', data: encodeUtf8('x'), mtime: new Date(1_700_000_000_000) }], {
    isDeterministic: true
  });
  const [entry] = (await TarReader.fromUint8Array(archive)).entries();
  assert.deepEqual(entry?.mtime, new Date(0));
  assert.deepEqual(
    await writeTar([{ name: 'a.txt', data: encodeUtf8('x') }], { isDeterministic: true }),
    archive
  );
});

test('names longer than 100 bytes are carried in PAX records', async () => {
  const longName = `${'nested/'.repeat(20)}file.json`;
  const wideName = `${'é'.repeat(60)}.json`;
  assert.ok(wideName.length < 100);
  const archive = await writeTar([
    { name: longName, data: encodeUtf8('1') },
    { name: wideName, data: encodeUtf8('2') }
  ]);
  const reader = await TarReader.fromUint8Array(archive);
  const entries = reader.entries();
  assert.deepEqual(
    entries.map((entry) => entry.name),
    [longName, wideName]
  );
  assert.equal(archive.length, 8 * 512 + 1024);
  assert.equal(decodeUtf8(reader.read(entries[1]!)), '2');
});

test('iterEntries yields readable entries in order', async () => {
  const archive = await writeTar([
    { name: 'one', data: encodeUtf8('1') },
    { name: 'two', data: encodeUtf8('22') }
  ]);
  const reader = await TarReader.fromSource(archive);
  const seen: string[] = [];
  for await (const entry of reader.iterEntries()) {
    seen.push(`${entry.name}=${decodeUtf8(reader.read(entry))}`);
  }
  assert.deepEqual(seen, ['one=1', 'two=22']);
});

test('checksum mismatch is fatal', async () => {
  const archive = await writeTar([{ name: 'a.txt', data: encodeUtf8('x') }]);
  archive[0] = 'b'.charCodeAt(0);
  await assert.rejects(TarReader.fromUint8Array(archive), (err: unknown) => {
    assert.ok(err instanceof ArchiveError);
    assert.equal(err.code, 'ARCHIVE_BAD_HEADER');
    assert.equal(err.offset, 0n);
    return true;
  });
});

test('names keep leading and trailing spaces', async () => {
  const names = [' lead.json', 'trail.json ', 'a', 'a ', 'sub/ x.json', '日本/ é .json'];
  const archive = await writeTar(names.map((name, i) => ({ name, data: encodeUtf8(String(i)) })));
  const reader = await TarReader.fromUint8Array(archive);
  const entries = reader.entries();
  assert.deepEqual(
    entries.map((entry) => entry.name),
    names
  );
  assert.deepEqual(
    entries.map((entry) => decodeUtf8(reader.read(entry))),
    ['0', '1', '2', '3', '4', '5']
  );
});

test('truncated entry data is reported', async () => {
  const archive = await writeTar([{ name: 'big.bin', data: new Uint8Array(600) }]);
  await assert.rejects(
    TarReader.fromUint8Array(archive.subarray(0, 612)),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_TRUNCATED'
  );
});

test('entry count and size limits are enforced', async () => {
  const archive = await writeTar([
    { name: 'a', data: new Uint8Array(10) },
    { name: 'b', data: new Uint8Array(10) }
  ]);
  await assert.rejects(
    TarReader.fromUint8Array(archive, { limits: { maxEntries: 1 } }),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_LIMIT_EXCEEDED'
  );
  await assert.rejects(
    TarReader.fromUint8Array(archive, { limits: { maxUncompressedEntryBytes: 5 } }),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_LIMIT_EXCEEDED' && err.entryName === 'a'
  );
  await assert.rejects(
    TarReader.fromUint8Array(archive, { limits: { maxTotalUncompressedBytes: 15 } }),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_LIMIT_EXCEEDED'
  );
  await assert.rejects(
    TarReader.fromSource(archive, { limits: { maxInputBytes: 100 } }),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_LIMIT_EXCEEDED'
  );
});

test('read rejects entries from another reader', async () => {
  const archive = await writeTar([{ name: 'a', data: encodeUtf8('1') }]);
  const first = await TarReader.fromUint8Array(archive);
  const second = await TarReader.fromUint8Array(archive);
  const [entry] = first.entries();
  assert.throws(() => second.read(entry!), ArchiveError);
});

test('writer rejects NUL in names and a closed writer', async () => {
  const sink = new BufferSink();
  const writer = TarWriter.toSink(sink);
  await assert.rejects(writer.add('a\u0000b', encodeUtf8('x')), ArchiveError);
  await writer.close();
  await assert.rejects(writer.add('late', encodeUtf8('x')), ArchiveError);
  assert.equal(sink.position, 1024n);
});
