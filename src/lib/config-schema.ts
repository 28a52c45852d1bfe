/**
 * Configuration Schema Validation
 *
 * Zod schemas for validating mirror configuration loaded from .olmirrorrc
 * files and environment variables.
 */

import { z } from 'zod';

/**
 * Mirror Configuration Schema
 */
export const MirrorConfigSchema = z.object({
  /** Working directory for downloads and segments */
  dataDir: z.string().optional(),

  /** Manifest file path */
  manifestPath: z.string().optional(),

  /** Dataset repository id (e.g. "owner/ol_dump") */
  datasetId: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'datasetId must look like "owner/name"')
    .optional(),

  /** Base URL of the bulk exports */
  baseUrl: z.string().url().optional(),

  /** Row threshold for flushing a segment */
  batchRows: z.number().int().positive().optional(),

  /** Estimated byte threshold for flushing a segment */
  batchBytes: z.number().int().positive().optional(),

  /** Attempts for network operations */
  maxRetries: z.number().int().min(1).max(10).optional(),

  /** Initial backoff delay in ms */
  retryDelayMs: z.number().int().nonnegative().optional(),

  /** Which dataset store to publish to */
  store: z.enum(['huggingface', 'local']).optional(),

  /** Root directory of the local dataset store */
  localStoreDir: z.string().optional(),

  /** Back up fetched dumps to the raw branch of the dataset */
  backupRaw: z.boolean().optional(),
});

/** Type inferred from MirrorConfigSchema */
export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;

/**
 * Validate mirror configuration
 *
 * @throws {z.ZodError} If validation fails
 */
export function validateMirrorConfig(config: unknown): MirrorConfig {
  return MirrorConfigSchema.parse(config);
}

/**
 * Safely validate mirror configuration without throwing
 */
export function safeValidateMirrorConfig(config: unknown): z.SafeParseReturnType<unknown, MirrorConfig> {
  return MirrorConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
