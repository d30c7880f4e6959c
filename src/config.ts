/**
 * framecode — Configuration
 *
 * Option defaults and the schemas that validate option values at the
 * public boundary. Only the logger reads the environment.
 */

import { z } from 'zod';
import type { WidthPolicy } from './types';

export const DEFAULT_WIDTH_POLICY: WidthPolicy = 'any';

/** Seqname.matches requires a full match unless told otherwise. */
export const DEFAULT_STRICT_MATCH = true;

export const WidthPolicySchema = z.enum(['any', 'min', 'max', 'exact']);

export const ConventionIdSchema = z.enum(['format_code', 'modulo', 'hash', 'digits']);

export const WidthSchema = z.number().int().min(1);

export const FrameNumberSchema = z.number().int().safe();

export const FilenameSchema = z.union([z.string(), z.instanceof(URL)]);

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LogConfig {
  level: LogLevel;
}

const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'silent',
};

/**
 * Read the logger configuration from the environment.
 * FRAMECODE_LOG_LEVEL selects the level; an unknown value keeps the default.
 */
export function loadLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const level = LogLevelSchema.safeParse(env.FRAMECODE_LOG_LEVEL?.trim().toLowerCase());
  return {
    ...DEFAULT_LOG_CONFIG,
    ...(level.success ? { level: level.data } : {}),
  };
}
