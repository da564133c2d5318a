import type { Command } from 'commander';
import { createArchive } from '../../archive/create.js';
import { compressionFromFlags } from '../../compression/detect.js';
import type { CliIo } from '../io.js';
import { addLimitOptions, addOutputOptions, collect, policyFromOptions, type LimitOptions, type OutputOptions } from '../options.js';
import { Reporter } from '../reporter.js';

type CreateCommandOptions = LimitOptions &
  OutputOptions & {
    file: string;
    directory?: string;
    gzip?: boolean;
    xz?: boolean;
    zstd?: boolean;
    exclude: string[];
    excludeFrom: string[];
    manifestOut?: string;
    printPlan?: boolean;
    followSymlinks?: boolean;
  };

export function registerCreate(program: Command, io: CliIo): void {
  const command = program
    .command('create')
    .alias('c')
    .description('Create an archive from files and directories')
    .argument('<paths...>', 'Files and directories to archive')
    .requiredOption('-f, --file <archive>', 'Archive to write')
    .option('-C, --directory <dir>', 'Resolve inputs against this directory')
    .option('-z, --gzip', 'Compress with gzip')
    .option('-J, --xz', 'Compress with xz')
    .option('--zstd', 'Compress with zstd (wins when several codecs are given)')
    .option('--exclude <glob>', 'Leave out matching paths; repeatable', collect, [])
    .option('--exclude-from <file>', 'Read exclude patterns from a file; repeatable', collect, [])
    .option('--manifest-out <file>', 'Write a SHA-256 manifest of the archived tree')
    .option('--print-plan', 'List what would be archived without writing')
    .option('--follow-symlinks', 'Archive what symlinks point to instead of the links');
  addOutputOptions(command);
  addLimitOptions(command);

  command.action(async (paths: string[], options: CreateCommandOptions) => {
    const reporter = new Reporter(io, options);
    await createArchive(
      {
        archivePath: options.file,
        inputs: paths,
        compression: compressionFromFlags(options),
        excludes: options.exclude,
        excludeFrom: options.excludeFrom,
        onProgress: reporter.progress,
        ...(options.directory !== undefined ? { workDir: options.directory } : {}),
        ...(options.manifestOut !== undefined ? { manifestOut: options.manifestOut } : {}),
        ...(options.printPlan ? { printPlan: true } : {})
      },
      policyFromOptions(options).withFlags({ followSymlinks: options.followSymlinks ?? false })
    );
  });
}
