import type { Command } from 'commander';
import { listArchive } from '../../archive/list.js';
import type { CliIo } from '../io.js';
import { addOutputOptions, type OutputOptions } from '../options.js';
import { Reporter } from '../reporter.js';

type ListCommandOptions = OutputOptions & {
  file: string;
  json?: boolean;
  strict?: boolean;
};

export function registerList(program: Command, io: CliIo): void {
  const command = program
    .command('list')
    .alias('t')
    .description('List archive entries without extracting')
    .requiredOption('-f, --file <archive>', 'Archive to read')
    .option('--json', 'Print entries as manifest JSON in archive order')
    .option('--strict', 'Fail on header checksum mismatches');
  addOutputOptions(command);

  command.action(async (options: ListCommandOptions) => {
    const reporter = new Reporter(io, options);
    const result = await listArchive({ archivePath: options.file, strict: options.strict ?? false });
    reporter.warnings(result.warnings);
    if (options.json) {
      reporter.manifest(result.entries);
    } else {
      reporter.listing(result.entries);
    }
  });
}
