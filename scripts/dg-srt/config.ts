import { config as loadEnv } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConvertError } from './errors';

export const DEFAULT_LINE_LENGTH = 8;
export const MAX_LINE_LENGTH = 100;

export type DgSrtConfig = {
  lineLength: number;
  failFast: boolean;
  skipExisting: boolean;
};

const ENV_KEYS = ['DG_SRT_LINE_LENGTH', 'DG_SRT_FAIL_FAST', 'DG_SRT_SKIP_EXISTING'] as const;

const LineLengthSchema = z
  .string()
  .trim()
  .regex(/^\d+$/u, 'Line length must be a positive integer')
  .transform(Number)
  .pipe(z.number().int().min(1, 'Line length must be at least 1').max(MAX_LINE_LENGTH, `Line length must be at most ${MAX_LINE_LENGTH}`));

const FlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no'], { errorMap: () => ({ message: 'Expected one of 1, 0, true, false, yes, no' }) }))
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const RawEnvSchema = z.object({
  DG_SRT_LINE_LENGTH: LineLengthSchema.optional(),
  DG_SRT_FAIL_FAST: FlagSchema.optional(),
  DG_SRT_SKIP_EXISTING: FlagSchema.optional(),
});

let envLoaded = false;

function ensureEnvLoaded() {
  if (envLoaded) return;
  const explicit = process.env.DG_SRT_ENV_FILE;
  if (explicit) {
    const envPath = path.resolve(process.cwd(), explicit);
    if (!fs.existsSync(envPath)) {
      throw new ConvertError(`Missing dg-srt env file at ${envPath}`, { code: 'config_invalid', file: envPath });
    }
    loadEnv({ path: envPath, override: false });
  } else {
    const candidate = path.resolve(process.cwd(), '.dg-srt.env');
    if (fs.existsSync(candidate)) {
      loadEnv({ path: candidate, override: false });
    }
  }
  envLoaded = true;
}

// Blank values count as unset.
function pickEnv(): Partial<Record<(typeof ENV_KEYS)[number], string>> {
  const picked: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};
  for (const key of ENV_KEYS) {
    const value = process.env[key];
    if (value !== undefined && value.trim().length > 0) {
      picked[key] = value;
    }
  }
  return picked;
}

export function loadDgSrtConfig(): DgSrtConfig {
  ensureEnvLoaded();
  const parsed = RawEnvSchema.safeParse(pickEnv());
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    throw new ConvertError(`Invalid dg-srt configuration: ${JSON.stringify(flat.fieldErrors)}`, {
      code: 'config_invalid',
      details: flat.fieldErrors,
    });
  }
  const raw = parsed.data;
  return {
    lineLength: raw.DG_SRT_LINE_LENGTH ?? DEFAULT_LINE_LENGTH,
    failFast: raw.DG_SRT_FAIL_FAST ?? false,
    skipExisting: raw.DG_SRT_SKIP_EXISTING ?? false,
  };
}

export function __resetDgSrtConfigForTests() {
  envLoaded = false;
}
