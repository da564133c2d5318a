/** What an archive entry materializes as. */
export type EntryKind = 'File' | 'Directory' | 'Symlink';

/** Progress notification emitted by create, extract and list. */
export type ProgressEvent = {
  phase: 'plan' | 'add' | 'extract' | 'list';
  path: string;
  kind: EntryKind;
  size: bigint;
  /** Link target for symlinks. */
  target?: string;
  /** PAX records carried by the entry (list only). */
  pax?: Record<string, string>;
};

export type ProgressCallback = (event: ProgressEvent) => void;
