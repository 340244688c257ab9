import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { getLogger } from '../logging/logger.js';
import { ServiceError } from '../errors/service-error.js';

const logger = getLogger('response-validation');

export class ContractViolationError extends ServiceError {
  readonly zodError: ZodError;

  constructor(sourceService: string, operation: string, zodError: ZodError) {
    super('ContractViolationError', `Response contract violation from ${sourceService} in ${operation}`, {
      statusCode: 502,
      code: 'CONTRACT_VIOLATION',
      details: {
        sourceService,
        operation,
        issues: zodError.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
          code: i.code,
        })),
      },
    });
    this.zodError = zodError;
  }
}

export function parseServiceResponse<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  sourceService: string,
  operation: string
): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  logger.warn('Response contract violation', {
    sourceService,
    operation,
    issues: result.error.issues.slice(0, 10).map(i => ({
      path: i.path.join('.'),
      expected: i.message,
      code: i.code,
    })),
    receivedKeys: data && typeof data === 'object' ? Object.keys(data) : typeof data,
  });

  throw new ContractViolationError(sourceService, operation, result.error);
}
