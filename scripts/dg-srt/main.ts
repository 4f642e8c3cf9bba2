import { createDeepgramSrtBackend, type CaptionBackend } from './captions';
import { parseCliArgs, printUsage, USAGE, type CliInvocation } from './cli';
import { loadDgSrtConfig, type DgSrtConfig } from './config';
import { formatError, isConvertError } from './errors';
import { logger } from './logger';
import { runBatch } from './runner';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type MainDeps = {
  createBackend?: (options: { lineLength: number }) => CaptionBackend;
};

export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  let invocation: CliInvocation;
  try {
    invocation = parseCliArgs(argv);
  } catch (err) {
    if (isConvertError(err) && err.code === 'usage') {
      printUsage(err.message);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (invocation.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  let cfg: DgSrtConfig;
  try {
    cfg = loadDgSrtConfig();
  } catch (err) {
    logger.error('Invalid configuration', { error: formatError(err) });
    return EXIT_USAGE;
  }

  const lineLength = invocation.lineLength ?? cfg.lineLength;
  const failFast = invocation.failFast ?? cfg.failFast;
  const skipExisting = invocation.skipExisting ?? cfg.skipExisting;
  const createBackend = deps.createBackend ?? createDeepgramSrtBackend;
  const backend = createBackend({ lineLength });

  logger.debug('Resolved options', { lineLength, failFast, skipExisting, backend: backend.name });

  try {
    const report = await runBatch(invocation.patterns, { backend, failFast, skipExisting });
    if (report.failed > 0) {
      const failures = report.outcomes.flatMap((outcome) =>
        outcome.status === 'failed' ? [`${outcome.input} (${outcome.error.message})`] : [],
      );
      logger.error('Some errors occurred during processing these files', { failures });
      return EXIT_FAILURE;
    }
    return EXIT_OK;
  } catch (err) {
    logger.error('Batch aborted', {
      error: formatError(err),
      code: isConvertError(err) ? err.code : null,
      file: isConvertError(err) ? err.file ?? null : null,
    });
    return EXIT_FAILURE;
  }
}
