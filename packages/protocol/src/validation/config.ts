// Load file configuration
//
// All keys are optional; resolveConfig fills in defaults and rejects
// values that would produce an unusable manifest or container.

import { z } from 'zod';
import { DEFAULT_MAX_NAME_LENGTH } from '../naming/sanitize.js';

export const DEFAULT_SOFTWARE_NAME = 'loadfile';
export const DEFAULT_SOFTWARE_VERSION = '0.1.0';

export const loadFileConfigSchema = z
  .object({
    /** Custodian assigned to every document location */
    custodian: z.string().min(1).default('Unknown'),
    /** Locale attribute of the manifest root */
    locale: z.string().min(1).default('US'),
    /** Description attribute of the manifest root */
    description: z.string().min(1).default('EDRM XML Load File'),
    /** date-fns format used to parse mapping item dates when an entry gives none */
    itemDateFormat: z.string().min(1).default('yyyy-MM-dd HH:mm:ss.SSS'),
    /** Cap on sanitized entry names */
    maxNameLength: z.number().int().min(16).max(255).default(DEFAULT_MAX_NAME_LENGTH),
    /** Container metadata properties */
    caseNumber: z.string().default('01'),
    evidenceNumber: z.string().default('01'),
    examiner: z.string().default('Unknown'),
    softwareName: z.string().min(1).default(DEFAULT_SOFTWARE_NAME),
    softwareVersion: z.string().min(1).default(DEFAULT_SOFTWARE_VERSION),
  })
  .strict();

/**
 * Fully resolved configuration
 */
export type LoadFileConfig = z.output<typeof loadFileConfigSchema>;

/**
 * Configuration as supplied by callers
 */
export type LoadFileConfigInput = z.input<typeof loadFileConfigSchema>;

/**
 * A single configuration problem
 */
export type ConfigIssue = {
  path: string;
  message: string;
};

/**
 * Result of validating a configuration object
 */
export type ConfigValidationResult =
  | { valid: true; config: LoadFileConfig }
  | { valid: false; issues: ConfigIssue[] };

/**
 * Validate a configuration object without throwing.
 */
export function validateConfig(input: unknown = {}): ConfigValidationResult {
  const result = loadFileConfigSchema.safeParse(input ?? {});
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return {
    valid: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    })),
  };
}
