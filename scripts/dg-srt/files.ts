import { promises as fs } from 'fs';
import { glob } from 'glob';
import { ConvertError, formatError } from './errors';
import { logger } from './logger';

/**
 * Expands each pattern on its own and concatenates the matches in pattern
 * order. Nothing is sorted or deduplicated: overlapping patterns yield the
 * same path twice. Directories never match.
 */
export async function expandGlobs(patterns: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    let matches: string[];
    try {
      matches = await glob(pattern, { nodir: true });
    } catch (err) {
      throw new ConvertError(`Globbing files with pattern "${pattern}" failed: ${formatError(err)}`, {
        code: 'glob_failed',
        details: { pattern },
        cause: err,
      });
    }
    if (matches.length === 0) {
      logger.warn('Pattern matched no files', { pattern });
    }
    files.push(...matches);
  }
  return files;
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Only a missing path counts as absent; any other failure is reported. */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw new ConvertError(`Checking whether "${filePath}" exists failed: ${formatError(err)}`, {
      code: 'read_failed',
      file: filePath,
      cause: err,
    });
  }
}
