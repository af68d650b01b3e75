/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Option identifiers may contain spaces but not line breaks
 */
const optionNameSchema = z
  .string()
  .min(1)
  .regex(/^[^\r\n]+$/, 'must be a single line');

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['text', 'json']);

/**
 * Engine option schema, discriminated by option type
 */
export const engineOptionSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('check'), name: optionNameSchema, default: z.boolean() }),
    z.object({
      type: z.literal('spin'),
      name: optionNameSchema,
      default: z.number().int(),
      min: z.number().int(),
      max: z.number().int(),
    }),
    z.object({
      type: z.literal('combo'),
      name: optionNameSchema,
      default: z.string(),
      vars: z.array(z.string().min(1)),
    }),
    z.object({ type: z.literal('button'), name: optionNameSchema }),
    z.object({ type: z.literal('string'), name: optionNameSchema, default: z.string() }),
  ])
  .superRefine((option, ctx) => {
    if (option.type === 'spin' && (option.default < option.min || option.default > option.max)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'default must lie between min and max',
        path: ['default'],
      });
    }
  });

/**
 * Engine configuration schema
 */
export const engineConfigSchema = z.object({
  name: z.string().min(1),
  author: z.string().min(1),
  options: z.array(engineOptionSchema),
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  format: outputFormatSchema,
  color: z.boolean(),
});

/**
 * Inspection configuration schema
 */
export const inspectConfigSchema = z.object({
  replayMoves: z.boolean(),
  reportUnknown: z.boolean(),
  strict: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  output: outputConfigSchema,
  inspect: inspectConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
  inspect: inspectConfigSchema.partial().optional(),
});

export type PartialKnightlineConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): z.infer<typeof configSchema> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialKnightlineConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
