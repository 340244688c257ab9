import { DomainErrorCode, createDomainServiceError } from '@clusterwatch/platform-core';

const StatsAgentDomainCodes = {
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  IDENTITY_UNAVAILABLE: 'IDENTITY_UNAVAILABLE',
} as const;

export const StatsAgentErrorCodes = { ...DomainErrorCode, ...StatsAgentDomainCodes } as const;

const StatsAgentErrorBase = createDomainServiceError('StatsAgent', StatsAgentErrorCodes);

export class StatsAgentError extends StatsAgentErrorBase {
  static configurationError(reason: string, cause?: Error) {
    return new StatsAgentError(`Configuration error: ${reason}`, 500, StatsAgentErrorCodes.CONFIGURATION_ERROR, cause);
  }

  static identityUnavailable(reason: string, cause?: Error) {
    return new StatsAgentError(
      `Cluster identity could not be resolved: ${reason}`,
      503,
      StatsAgentErrorCodes.IDENTITY_UNAVAILABLE,
      cause
    );
  }
}

/**
 * The stats endpoint could not be reached: connection refused, DNS failure,
 * timeout or a non-success HTTP status.
 */
export class TransportError extends StatsAgentErrorBase {
  readonly target: string;

  constructor(target: string, reason: string, cause?: Error) {
    super(`Failed to fetch ${target} stats: ${reason}`, 503, StatsAgentErrorCodes.TRANSPORT_ERROR, cause);
    this.name = 'TransportError';
    this.target = target;
  }
}

/**
 * A response arrived but does not have the expected snapshot shape.
 */
export class ParseError extends StatsAgentErrorBase {
  readonly target: string;

  constructor(target: string, reason: string, cause?: Error) {
    super(`Malformed ${target} stats response: ${reason}`, 502, StatsAgentErrorCodes.PARSE_ERROR, cause);
    this.name = 'ParseError';
    this.target = target;
  }
}
