// Command line entry for annotating an NPPES endpoint file
import { Command, CommanderError } from 'commander';
import type { Reporter } from '../shared/models';
import { createValidationDispatcher } from '../pipeline/validation-dispatcher';
import type { ValidationDispatcher } from '../pipeline/validation-dispatcher';
import { processEndpointFile } from '../pipeline/session-controller';
import { createCertificateDiscovery } from '../shared/utils/certificate-discovery';
import { config } from '../shared/utils/environment';
import { RecordProcessingError, UsageError, describeError } from '../shared/utils/error-handling';
import { formatEmailValidator } from '../shared/utils/validation';

export const USAGE_LINES = [
  `You must supply an NPPES endpoint input file. If the destination file is omitted, the default is ${config.defaultOutputPath}`,
  'Usage: endpoint-annotator run <nppes_endpoint_file> [nppes_output_file]'
];

export interface CliDependencies {
  reporter?: Reporter;
  /** Replaces the email and certificate validators, mainly for tests */
  dispatcher?: ValidationDispatcher;
  /** Cancels the run between records; SIGINT and SIGTERM do the same */
  signal?: AbortSignal;
}

function createDefaultDispatcher(reporter: Reporter): ValidationDispatcher {
  return createValidationDispatcher({
    emailValidator: formatEmailValidator,
    certificateDiscovery: createCertificateDiscovery({ reporter })
  });
}

/**
 * Annotates the file, turning SIGINT/SIGTERM into a cooperative stop
 */
async function runCommand(inputPath: string, outputPath: string, deps: CliDependencies): Promise<void> {
  if (!inputPath.trim()) {
    throw new UsageError('Input path must not be empty');
  }

  const reporter = deps.reporter ?? console;
  const dispatcher = deps.dispatcher ?? createDefaultDispatcher(reporter);

  const controller = new AbortController();
  const interrupt = (): void => controller.abort();
  deps.signal?.addEventListener('abort', interrupt, { once: true });
  if (deps.signal?.aborted) {
    controller.abort();
  }

  // A second signal falls through to the default handler and kills the process
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    await processEndpointFile(inputPath, outputPath, {
      dispatcher,
      reporter,
      signal: controller.signal
    });
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
    deps.signal?.removeEventListener('abort', interrupt);
  }
}

export function buildProgram(deps: CliDependencies = {}): Command {
  const reporter = deps.reporter ?? console;
  const program = new Command();

  program
    .name('endpoint-annotator')
    .description('Annotate an NPPES endpoint file with email and Direct certificate validity')
    .exitOverride()
    .configureOutput({
      writeOut: str => reporter.log(str.trimEnd()),
      writeErr: str => reporter.error(str.trimEnd())
    });

  program
    .command('run', { isDefault: true })
    .description('Process the endpoint file, resuming after rows already in the output file')
    .argument('<input-path>', 'NPPES endpoint CSV file')
    .argument('[output-path]', 'annotated CSV file', config.defaultOutputPath)
    .allowExcessArguments(false)
    .action(async (inputPath: string, outputPath: string) => {
      await runCommand(inputPath, outputPath, deps);
    });

  return program;
}

/**
 * Runs the CLI and resolves with the process exit code
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const reporter = deps.reporter ?? console;
  const program = buildProgram(deps);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode !== 0) {
        USAGE_LINES.forEach(line => reporter.error(line));
      }
      return error.exitCode === 0 ? 0 : 1;
    }

    if (error instanceof RecordProcessingError) {
      // Progress and resume point were already reported by the session
      return 1;
    }

    if (error instanceof UsageError) {
      reporter.error(error.message);
      USAGE_LINES.forEach(line => reporter.error(line));
      return 1;
    }

    reporter.error(`Error: ${describeError(error)}`);
    return 1;
  }
}
