import { getLogger, type Logger } from '@clusterwatch/platform-core';
import type { IMetricEmitter } from '../../application/interfaces';

export class LoggingMetricEmitter implements IMetricEmitter {
  constructor(private readonly logger: Pick<Logger, 'info'> = getLogger('metric-emitter')) {}

  emit(name: string, units: string, value: number): void {
    this.logger.info('metric', { metric: name, units, value });
  }
}
