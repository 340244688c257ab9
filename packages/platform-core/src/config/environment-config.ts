/**
 * Environment Configuration Utilities
 *
 * Environment variable parsing and validation for services.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { getLogger } from '../logging/logger.js';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

const logger = getLogger('environment-config');

export type EnvSource = Record<string, string | undefined>;

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

/**
 * Validate the environment against a zod schema and return the typed result.
 * Fails fast with a CONFIGURATION_ERROR listing every invalid variable.
 */
export function loadServiceConfig<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  serviceName: string,
  env: EnvSource = process.env
): T {
  const result = schema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(i => ({
    variable: i.path.join('.'),
    message: i.message,
  }));

  logger.error('Invalid service configuration', { serviceName, issues });

  throw new DomainError(
    `Invalid configuration for ${serviceName}: ${issues.map(i => `${i.variable} (${i.message})`).join(', ')}`,
    500,
    undefined,
    DomainErrorCode.CONFIGURATION_ERROR,
    { serviceName, issues }
  );
}
