export type ConvertErrorCode =
  | 'usage'
  | 'config_invalid'
  | 'glob_failed'
  | 'read_failed'
  | 'decode_failed'
  | 'parse_failed'
  | 'conversion_failed'
  | 'write_failed';

export type ConvertErrorDetails = Record<string, unknown>;

export class ConvertError extends Error {
  readonly code: ConvertErrorCode;
  readonly file?: string;
  readonly details?: ConvertErrorDetails;

  constructor(message: string, options: { code: ConvertErrorCode; file?: string; details?: ConvertErrorDetails; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConvertError';
    this.code = options.code;
    if (options.file !== undefined) {
      this.file = options.file;
    }
    if (options.details) {
      this.details = options.details;
    }
  }
}

export function isConvertError(err: unknown): err is ConvertError {
  return err instanceof ConvertError;
}

export function formatError(err: unknown) {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
