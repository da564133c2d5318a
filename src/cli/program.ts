import { Command, CommanderError } from 'commander';
import { EXIT_CODES, exitCodeFor } from '../errors.js';
import { registerCreate } from './commands/create.js';
import { registerExtract } from './commands/extract.js';
import { registerList } from './commands/list.js';
import { processIo, type CliIo } from './io.js';
import { Reporter } from './reporter.js';

export const VERSION = '0.1.0';

/** Commander program wired to `io`; parse errors throw instead of exiting. */
export function buildProgram(io: CliIo): Command {
  const program = new Command('tarward')
    .description('Create, extract and list tar archives under a path and quota policy.')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
  registerCreate(program, io);
  registerExtract(program, io);
  registerList(program, io);
  return program;
}

/**
 * Run one command line (without the node and script arguments) and return
 * the exit status: 0 success, 1 I/O or format failure, 2 bad usage or
 * input, 3 policy or manifest violation.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT_CODES.success;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES['user-input'];
    }
    new Reporter(io).error(err);
    return exitCodeFor(err);
  }
}
