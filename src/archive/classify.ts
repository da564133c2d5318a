import type { TarEntryType } from '../tar/types.js';
import type { EntryKind } from '../types.js';

/** Map a tar type flag onto what extraction materializes; unknown types become files. */
export function classifyEntry(type: TarEntryType): EntryKind {
  switch (type) {
    case 'directory':
      return 'Directory';
    case 'symlink':
      return 'Symlink';
    case 'file':
    case 'contiguous':
    case 'sparse':
    case 'link':
    case 'character':
    case 'block':
    case 'fifo':
    case 'unknown':
      return 'File';
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
}
