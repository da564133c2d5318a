import type { Command } from 'commander';
import { extractArchive } from '../../archive/extract.js';
import type { CliIo } from '../io.js';
import { addLimitOptions, addOutputOptions, policyFromOptions, type LimitOptions, type OutputOptions } from '../options.js';
import { Reporter } from '../reporter.js';

type ExtractCommandOptions = LimitOptions &
  OutputOptions & {
    file: string;
    directory?: string;
    strict?: boolean;
    manifest?: string;
    manifestRelaxed?: boolean;
    numericOwner?: boolean;
    sameOwner: boolean;
  };

export function registerExtract(program: Command, io: CliIo): void {
  const command = program
    .command('extract')
    .alias('x')
    .description('Extract an archive under a destination root')
    .requiredOption('-f, --file <archive>', 'Archive to read')
    .option('-C, --directory <dir>', 'Destination root, created when missing')
    .option('--strict', 'Fail on header checksum mismatches')
    .option('--manifest <file>', 'Verify the extracted tree against a manifest')
    .option('--manifest-relaxed', 'Allow entries the manifest does not list')
    .option('--numeric-owner', 'Restore ownership from numeric ids only')
    .option('--no-same-owner', 'Never restore ownership');
  addOutputOptions(command);
  addLimitOptions(command);

  command.action(async (options: ExtractCommandOptions) => {
    const reporter = new Reporter(io, options);
    const result = await extractArchive(
      {
        archivePath: options.file,
        strict: options.strict ?? false,
        manifestRelaxed: options.manifestRelaxed ?? false,
        numericOwner: options.numericOwner ?? false,
        noSameOwner: !options.sameOwner,
        onProgress: reporter.progress,
        ...(options.directory !== undefined ? { destination: options.directory } : {}),
        ...(options.manifest !== undefined ? { manifest: options.manifest } : {})
      },
      policyFromOptions(options)
    );
    reporter.warnings(result.warnings);
  });
}
