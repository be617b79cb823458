// Resolve a caller configuration into a full one, throwing on problems

import { ValidationError } from '../errors.js';
import { validateConfig, type LoadFileConfig } from './config.js';

/**
 * Resolve configuration, applying defaults.
 *
 * @throws ValidationError listing every problem found
 */
export function resolveConfig(input: unknown = {}): LoadFileConfig {
  const result = validateConfig(input);
  if (!result.valid) {
    const summary = result.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid load file configuration: ${summary}`, {
      details: { issues: result.issues },
    });
  }
  return result.config;
}
