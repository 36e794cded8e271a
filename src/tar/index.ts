export { TarReader } from './TarReader.js';
export { TarWriter } from './TarWriter.js';
export type {
  TarEntry,
  TarEntryType,
  TarReaderOptions,
  TarWriterOptions,
  TarWriterAddOptions
} from './types.js';
