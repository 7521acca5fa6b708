import { registerAs } from '@nestjs/config';
import { MAX_CONCURRENCY_LIMIT, MAX_TIMEOUT_SECONDS, MIN_TIMEOUT_SECONDS } from '../common/constants';
import { AppLogger } from '../common/logger/app-logger.service';

const logger = AppLogger.create('ReaderConfig');

export interface ReaderConfig {
  defaultConcurrency: number;
  maxConcurrency: number;
  /** Seconds. */
  defaultTimeout: number;
  maxBodyBytes: number;
  maxRedirects: number;
  /** Lower-case keywords matched against the response content-type; empty accepts everything. */
  allowedContentTypes: string[];
  userAgent: string;
}

type Env = Record<string, string | undefined>;

interface NumberBounds {
  min: number;
  max?: number;
}

function clamp(value: number, { min, max }: NumberBounds): number {
  const lowered = Math.max(min, value);
  return max === undefined ? lowered : Math.min(max, lowered);
}

export function envNumber(
  env: Env,
  name: string,
  fallback: number,
  bounds: NumberBounds,
  { integer = true }: { integer?: boolean } = {},
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return clamp(fallback, bounds);
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    logger.warn(`${name} is not a valid ${integer ? 'integer' : 'number'}, falling back to ${fallback}`, {
      event: 'config_invalid_value',
      variable: name,
      value: raw,
    });
    return clamp(fallback, bounds);
  }

  return clamp(value, bounds);
}

export function envList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

export function loadReaderConfig(env: Env): ReaderConfig {
  const defaultConcurrency = envNumber(env, 'READER_DEFAULT_CONCURRENCY', 10, {
    min: 1,
    max: MAX_CONCURRENCY_LIMIT,
  });

  return {
    defaultConcurrency,
    maxConcurrency: envNumber(env, 'READER_MAX_CONCURRENCY', MAX_CONCURRENCY_LIMIT, {
      min: defaultConcurrency,
      max: MAX_CONCURRENCY_LIMIT,
    }),
    defaultTimeout: envNumber(
      env,
      'READER_DEFAULT_TIMEOUT',
      15,
      { min: MIN_TIMEOUT_SECONDS, max: MAX_TIMEOUT_SECONDS },
      { integer: false },
    ),
    maxBodyBytes: envNumber(env, 'READER_MAX_BODY_BYTES', 5 * 1024 * 1024, { min: 1024 }),
    maxRedirects: envNumber(env, 'READER_MAX_REDIRECTS', 5, { min: 0, max: 20 }),
    allowedContentTypes: envList(env, 'READER_ALLOWED_CONTENT_TYPES', ['text', 'html', 'xml']),
    userAgent: env.READER_USER_AGENT?.trim() || 'Mozilla/5.0 (compatible; UrlReader/1.0)',
  };
}

export const readerConfig = registerAs('reader', (): ReaderConfig => loadReaderConfig(process.env));
