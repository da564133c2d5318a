import { serializeManifest } from '../manifest/json.js';
import type { ManifestEntry } from '../manifest/types.js';
import type { TarIssue } from '../tar/types.js';
import type { ProgressEvent } from '../types.js';
import { paletteFor, type CliIo, type Palette } from './io.js';
import type { OutputOptions } from './options.js';

const PROGRAM = 'tarward';

/** Renders operation progress, warnings and results for one command. */
export class Reporter {
  private readonly colors: Palette;
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(
    private readonly io: CliIo,
    options: OutputOptions = {}
  ) {
    this.colors = paletteFor(io);
    this.quiet = options.quiet ?? false;
    this.verbose = !this.quiet && (options.verbose ?? false);
  }

  /** Progress callback for the core operations. */
  readonly progress = (event: ProgressEvent): void => {
    if (this.quiet) return;
    if (event.phase === 'plan') {
      this.io.stdout(`${event.kind}\t${event.path}\n`);
      return;
    }
    if (!this.verbose) return;
    this.io.stdout(`${describe(event.path, event.target)}\n`);
  };

  warnings(issues: readonly TarIssue[]): void {
    if (this.quiet) return;
    for (const issue of issues) {
      const where = issue.entryName !== undefined ? ` (${issue.entryName})` : '';
      this.io.stderr(`${this.colors.yellow(`${PROGRAM}: warning:`)} ${issue.message} at offset ${issue.offset}${where}\n`);
    }
  }

  /** `tar t` style listing; verbose adds kind, size and digest columns. */
  listing(entries: readonly ManifestEntry[]): void {
    if (this.quiet) return;
    for (const entry of entries) {
      const name = describe(entry.path, entry.target ?? undefined);
      if (this.verbose) {
        this.io.stdout(`${entry.kind}\t${entry.size}\t${entry.sha256}\t${name}\n`);
      } else {
        this.io.stdout(`${name}\n`);
      }
    }
  }

  manifest(entries: readonly ManifestEntry[]): void {
    if (this.quiet) return;
    this.io.stdout(serializeManifest(entries));
  }

  error(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.io.stderr(`${this.colors.red(`${PROGRAM}:`)} ${message}\n`);
  }
}

function describe(path: string, target: string | undefined): string {
  return target !== undefined ? `${path} -> ${target}` : path;
}
