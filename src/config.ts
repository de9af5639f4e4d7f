/**
 * @lapcut/core — option schemas
 *
 * The codec reads no environment variables and no files of its own; every
 * setting arrives as an options object and is validated and defaulted here.
 */

import { z } from 'zod';
import { InvalidOptionsError } from './errors';
import type { TimeUnit } from './types';

// ─── Schemas ──────────────────────────────────────────────────────────────────

export const TimeUnitSchema = z.enum(['seconds', 'microseconds']) satisfies z.ZodType<TimeUnit>;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/** Lap index, or 'fastest'. Range checks happen against the actual laps. */
export const LapSelectorSchema = z.union([z.number().int(), z.literal('fastest')]);

export const MarkerOptionsSchema = z
  .object({
    timeUnit: TimeUnitSchema.default('seconds'),
  })
  .strict();

export const ExtractOptionsSchema = z
  .object({
    lap:              LapSelectorSchema.default('fastest'),
    timeUnit:         TimeUnitSchema.default('seconds'),
    fromSessionStart: z.boolean().default(false),
    logLevel:         LogLevelSchema.default('warn'),
  })
  .strict();

export type LogLevel               = z.infer<typeof LogLevelSchema>;
export type MarkerOptions          = z.input<typeof MarkerOptionsSchema>;
export type ResolvedMarkerOptions  = z.output<typeof MarkerOptionsSchema>;
export type ExtractOptions         = z.input<typeof ExtractOptionsSchema>;
export type ResolvedExtractOptions = z.output<typeof ExtractOptionsSchema>;

// ─── Resolution ───────────────────────────────────────────────────────────────

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(options)'}: ${issue.message}`)
    .join('; ');
}

export function resolveMarkerOptions(input: MarkerOptions = {}): ResolvedMarkerOptions {
  const result = MarkerOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(
      `Invalid marker options: ${describeIssues(result.error)}.`,
      { issues: result.error.issues.length },
    );
  }
  return result.data;
}

export function resolveExtractOptions(input: ExtractOptions = {}): ResolvedExtractOptions {
  const result = ExtractOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(
      `Invalid extraction options: ${describeIssues(result.error)}.`,
      { issues: result.error.issues.length },
    );
  }
  return result.data;
}
