/** TAR entry type identifiers. */
export type TarEntryType =
  | 'file'
  | 'contiguous'
  | 'sparse'
  | 'link'
  | 'symlink'
  | 'character'
  | 'block'
  | 'directory'
  | 'fifo'
  | 'unknown';

/** TAR entry metadata exposed by TarReader. */
export type TarEntry = {
  name: string;
  size: bigint;
  mtime?: Date;
  mode?: number;
  uid?: number;
  gid?: number;
  uname?: string;
  gname?: string;
  type: TarEntryType;
  linkName?: string;
  isDirectory: boolean;
  isSymlink: boolean;
  pax?: Record<string, string>;
};

/** An entry yielded while streaming; its body is readable until the iterator advances. */
export type TarReadEntry = TarEntry & {
  /** Stream the entry's data. Callable once. */
  open(): ReadableStream<Uint8Array>;
};

/** Non-fatal problem noticed while parsing. */
export type TarIssue = {
  code: 'TAR_BAD_CHECKSUM' | 'TAR_UNKNOWN_TYPE';
  message: string;
  offset: string;
  entryName?: string;
};

/** Options for creating TarReader instances. */
export type TarReaderOptions = {
  /** Fail on header checksum mismatches instead of recording a warning. */
  isStrict?: boolean;
  /** Ceiling on bytes pulled from the source stream. */
  maxInputBytes?: bigint | number;
};

/** Options for creating TarWriter instances. */
export type TarWriterOptions = {
  /** Zero timestamps and ownership and normalize modes. */
  isDeterministic?: boolean;
};

/** Options for adding entries with TarWriter. */
export type TarWriterAddOptions = {
  type?: TarEntryType;
  mtime?: Date;
  mode?: number;
  uid?: number;
  gid?: number;
  linkName?: string;
  size?: bigint;
  uname?: string;
  gname?: string;
  pax?: Record<string, string>;
};
