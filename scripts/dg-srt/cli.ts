import { MAX_LINE_LENGTH } from './config';
import { ConvertError } from './errors';

export type CliInvocation =
  | { kind: 'help' }
  | {
      kind: 'convert';
      patterns: string[];
      failFast?: boolean;
      skipExisting?: boolean;
      lineLength?: number;
    };

export const USAGE = [
  'Usage: dg-srt [--fail-fast] [--skip-existing] [--line-length <n>] <glob> [<glob> ...]',
  '',
  'Converts Deepgram transcription responses (JSON) into SRT subtitle files.',
  'Each match of <glob> is written beside itself with "_response" dropped from',
  'the file name and the extension replaced by .srt.',
  '',
  'Options:',
  '  --fail-fast        stop at the first file that fails to convert',
  '  --skip-existing    leave inputs whose .srt file already exists untouched',
  `  --line-length <n>  maximum words per caption cue (1-${MAX_LINE_LENGTH})`,
  '  -h, --help         show this message',
].join('\n');

function usageError(message: string): ConvertError {
  return new ConvertError(message, { code: 'usage' });
}

function parseLineLength(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/u.test(raw)) {
    throw usageError(`--line-length expects a positive integer, got ${raw === undefined ? 'nothing' : JSON.stringify(raw)}`);
  }
  const value = Number(raw);
  if (value < 1 || value > MAX_LINE_LENGTH) {
    throw usageError(`--line-length must be between 1 and ${MAX_LINE_LENGTH}, got ${value}`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliInvocation {
  const args = [...argv];
  const patterns: string[] = [];
  let failFast: boolean | undefined;
  let skipExisting: boolean | undefined;
  let lineLength: number | undefined;
  let positionalOnly = false;

  while (args.length > 0) {
    const tok = String(args.shift());
    if (positionalOnly || tok === '-' || !tok.startsWith('-')) {
      patterns.push(tok);
      continue;
    }
    if (tok === '--') {
      positionalOnly = true;
      continue;
    }
    if (tok.startsWith('--line-length=')) {
      lineLength = parseLineLength(tok.slice('--line-length='.length));
      continue;
    }
    switch (tok) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--fail-fast':
        failFast = true;
        break;
      case '--skip-existing':
        skipExisting = true;
        break;
      case '--line-length':
        lineLength = parseLineLength(args.shift());
        break;
      default:
        throw usageError(`Unknown option: ${tok}`);
    }
  }

  if (patterns.length === 0) {
    throw usageError('At least one glob pattern is required');
  }
  if (patterns.some((pattern) => pattern.length === 0)) {
    throw usageError('Glob patterns must not be empty');
  }

  return { kind: 'convert', patterns, failFast, skipExisting, lineLength };
}

export function printUsage(message?: string) {
  if (message) {
    console.error(message);
    console.error('');
  }
  console.error(USAGE);
}
