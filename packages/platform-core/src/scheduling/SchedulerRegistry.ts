/**
 * SchedulerRegistry - Central registry for all scheduled jobs
 * Provides global visibility and lifecycle management
 */

import { getLogger } from '../logging/logger.js';
import type { BaseScheduler } from './BaseScheduler.js';
import type { SchedulerInfo, SchedulerHealthReport } from './types.js';
import { registerPhasedShutdownHook } from '../lifecycle/gracefulShutdown.js';

const logger = getLogger('scheduler-registry');

class SchedulerRegistryClass {
  private schedulers: Map<string, BaseScheduler> = new Map();
  private shutdownHookRegistered = false;

  private getKey(scheduler: BaseScheduler): string {
    return `${scheduler.serviceName}:${scheduler.name}`;
  }

  register(scheduler: BaseScheduler): void {
    const key = this.getKey(scheduler);
    if (this.schedulers.has(key)) {
      logger.warn(`Scheduler already registered: ${key}, skipping duplicate`);
      return;
    }

    if (!this.shutdownHookRegistered) {
      this.shutdownHookRegistered = true;
      registerPhasedShutdownHook(
        'schedulers',
        async () => {
          logger.info('Stopping all schedulers via shutdown hook', { schedulers: Array.from(this.schedulers.keys()) });
          this.stopAll();
        },
        'SchedulerRegistry'
      );
    }

    this.schedulers.set(key, scheduler);
    logger.debug(`Scheduler registered: ${key}`, {
      cronExpression: scheduler.cronExpression,
    });
  }

  get(key: string): BaseScheduler | undefined {
    return this.schedulers.get(key);
  }

  getAll(): BaseScheduler[] {
    return Array.from(this.schedulers.values());
  }

  startAll(): void {
    logger.debug('Starting all schedulers...', { count: this.schedulers.size });
    for (const scheduler of this.schedulers.values()) {
      scheduler.start();
    }
  }

  stopAll(): void {
    logger.info('Stopping all schedulers...', { count: this.schedulers.size });
    for (const scheduler of this.schedulers.values()) {
      scheduler.stop();
    }
  }

  getAllInfo(): SchedulerInfo[] {
    return this.getAll().map(s => s.getInfo());
  }

  getHealthReport(): SchedulerHealthReport {
    const schedulers = this.getAllInfo();
    const runningCount = schedulers.filter(s => s.status === 'running').length;
    const totalErrors = schedulers.reduce((sum, s) => sum + s.errorCount, 0);
    const totalRuns = schedulers.reduce((sum, s) => sum + s.runCount, 0);
    const errorRate = totalRuns > 0 ? totalErrors / totalRuns : 0;

    return {
      healthy: this.getAll().every(s => s.isHealthy()),
      schedulers,
      totalSchedulers: schedulers.length,
      runningCount,
      errorRate,
    };
  }

  clear(): void {
    this.stopAll();
    this.schedulers.clear();
  }
}

export const SchedulerRegistry = new SchedulerRegistryClass();
