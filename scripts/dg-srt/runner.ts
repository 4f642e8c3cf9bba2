import { promises as fs } from 'fs';
import type { CaptionBackend } from './captions';
import { ConvertError, formatError, isConvertError } from './errors';
import { expandGlobs, fileExists } from './files';
import { logger } from './logger';
import { deriveOutputPath } from './output-path';

export type FileOutcome =
  | { status: 'converted'; input: string; output: string }
  | { status: 'skipped'; input: string; output: string }
  | { status: 'failed'; input: string; error: ConvertError };

export type BatchReport = {
  outcomes: FileOutcome[];
  converted: number;
  skipped: number;
  failed: number;
};

export type RunBatchOptions<TModel> = {
  backend: CaptionBackend<TModel>;
  failFast?: boolean;
  skipExisting?: boolean;
};

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export async function readTranscription(file: string): Promise<unknown> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(file);
  } catch (err) {
    throw new ConvertError(`Reading transcription file "${file}" failed: ${formatError(err)}`, {
      code: 'read_failed',
      file,
      cause: err,
    });
  }

  let text: string;
  try {
    text = utf8Decoder.decode(bytes);
  } catch (err) {
    throw new ConvertError(`Transcription file "${file}" is not valid UTF-8`, { code: 'decode_failed', file, cause: err });
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (err) {
    throw new ConvertError(`Transcription file "${file}" is not valid JSON: ${formatError(err)}`, {
      code: 'parse_failed',
      file,
      cause: err,
    });
  }
}

export function renderCaptions<TModel>(document: unknown, backend: CaptionBackend<TModel>, file: string): string {
  try {
    const model = backend.adapt(document);
    return backend.render(model);
  } catch (err) {
    throw new ConvertError(`Rendering captions for "${file}" failed: ${formatError(err)}`, {
      code: 'conversion_failed',
      file,
      details: { backend: backend.name },
      cause: err,
    });
  }
}

export async function writeCaptions(outputPath: string, captions: string): Promise<void> {
  try {
    await fs.writeFile(outputPath, captions, 'utf8');
  } catch (err) {
    throw new ConvertError(`Writing SRT file "${outputPath}" failed: ${formatError(err)}`, {
      code: 'write_failed',
      file: outputPath,
      cause: err,
    });
  }
}

/** Runs the read, parse, render and write steps for one transcription file. */
export async function convertFile<TModel>(file: string, backend: CaptionBackend<TModel>): Promise<string> {
  const document = await readTranscription(file);
  const captions = renderCaptions(document, backend, file);
  const outputPath = deriveOutputPath(file);
  await writeCaptions(outputPath, captions);
  return outputPath;
}

function toConvertError(err: unknown, file: string): ConvertError {
  if (isConvertError(err)) return err;
  return new ConvertError(`Converting "${file}" failed: ${formatError(err)}`, { code: 'conversion_failed', file, cause: err });
}

function summarize(outcomes: FileOutcome[]): BatchReport {
  let converted = 0;
  let skipped = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'converted') converted += 1;
    else if (outcome.status === 'skipped') skipped += 1;
    else failed += 1;
  }
  return { outcomes, converted, skipped, failed };
}

/**
 * Converts every file matched by `patterns`, one file at a time, in match
 * order. A failing file is recorded and the batch moves on, unless
 * `failFast` is set, in which case the first failure is thrown and the
 * remaining files are left untouched.
 */
export async function runBatch<TModel>(patterns: readonly string[], options: RunBatchOptions<TModel>): Promise<BatchReport> {
  const { backend, failFast = false, skipExisting = false } = options;
  const files = await expandGlobs(patterns);
  logger.info('Converting transcriptions', { patterns: [...patterns], files: files.length, backend: backend.name });

  const outcomes: FileOutcome[] = [];
  for (const file of files) {
    const startedAt = Date.now();
    try {
      if (skipExisting) {
        const existing = deriveOutputPath(file);
        if (await fileExists(existing)) {
          logger.info('SRT file already exists, skipping', { input: file, output: existing });
          outcomes.push({ status: 'skipped', input: file, output: existing });
          continue;
        }
      }
      const output = await convertFile(file, backend);
      logger.info('SRT file written', { input: file, output, elapsedMs: Date.now() - startedAt });
      outcomes.push({ status: 'converted', input: file, output });
    } catch (err) {
      const error = toConvertError(err, file);
      logger.error('Failed to convert transcription', { input: file, code: error.code, error: error.message });
      if (failFast) {
        throw error;
      }
      outcomes.push({ status: 'failed', input: file, error });
    }
  }

  const report = summarize(outcomes);
  logger.info('Batch finished', { converted: report.converted, skipped: report.skipped, failed: report.failed });
  return report;
}
