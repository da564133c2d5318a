export { TarReader } from './TarReader.js';
export { TarWriter } from './TarWriter.js';
export type {
  TarEntry,
  TarEntryType,
  TarIssue,
  TarReadEntry,
  TarReaderOptions,
  TarWriterAddOptions,
  TarWriterOptions
} from './types.js';
