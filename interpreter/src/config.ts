/**
 * Interpreter options, validated with zod.
 */

import { z } from 'zod';
import { SprigConfigError } from './errors';

export const DEFAULT_MAX_CALL_DEPTH = 300;

export const InterpreterOptionsSchema = z.object({
  maxCallDepth: z
    .number()
    .int()
    .min(1)
    .max(10_000)
    .default(DEFAULT_MAX_CALL_DEPTH)
    .describe('Maximum depth of nested function calls before a call fails'),
});

export type InterpreterOptions = z.output<typeof InterpreterOptionsSchema>;
export type InterpreterOptionsInput = z.input<typeof InterpreterOptionsSchema>;

const EnvOptionsSchema = z.object({
  SPRIG_MAX_CALL_DEPTH: z.coerce.number().optional(),
});

/**
 * Validate options and fill in defaults.
 */
export function resolveOptions(input: unknown = {}): InterpreterOptions {
  const result = InterpreterOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new SprigConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read option overrides from environment variables.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): InterpreterOptionsInput {
  const result = EnvOptionsSchema.safeParse(env);
  if (!result.success) {
    throw new SprigConfigError(formatIssues(result.error));
  }
  const options: InterpreterOptionsInput = {};
  if (result.data.SPRIG_MAX_CALL_DEPTH !== undefined) {
    options.maxCallDepth = result.data.SPRIG_MAX_CALL_DEPTH;
  }
  return options;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
