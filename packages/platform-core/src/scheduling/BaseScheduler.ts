/**
 * BaseScheduler - Abstract base class for all scheduled jobs
 * Provides shared start/stop/status/health logic
 */

import * as cron from 'node-cron';
import { getLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types.js';
import { serializeError } from '../logging/error-serializer.js';

export abstract class BaseScheduler {
  protected task: cron.ScheduledTask | null = null;
  protected logger: Logger;
  protected status: SchedulerStatus = 'stopped';

  protected lastRunAt: Date | null = null;
  protected lastRunDurationMs: number | null = null;
  protected lastRunSuccess: boolean | null = null;
  protected runCount = 0;
  protected errorCount = 0;
  protected skippedCount = 0;

  protected config: SchedulerConfig;

  constructor(config: SchedulerConfig) {
    this.config = {
      enabled: true,
      runOnStart: false,
      maxRetries: 0,
      retryDelayMs: 1000,
      timeoutMs: 300000,
      ...config,
    };
    this.logger = getLogger('scheduler');
  }

  protected initLogger(): void {
    this.logger = getLogger(`scheduler-${this.name}`);
  }

  abstract get name(): string;

  abstract get serviceName(): string;

  protected abstract execute(): Promise<SchedulerExecutionResult>;

  get cronExpression(): string {
    return this.config.cronExpression;
  }

  start(): void {
    if (this.task || this.status === 'running') {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!this.config.enabled) {
      this.logger.info(`[${this.name}] Disabled, not starting`);
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.config.cronExpression}`);
      return;
    }

    this.task = cron.schedule(this.config.cronExpression, () => {
      void this.runWithErrorHandling();
    });

    this.status = 'running';

    this.logger.info(`[${this.name}] Scheduler started`, {
      cronExpression: this.config.cronExpression,
    });

    if (this.config.runOnStart) {
      this.triggerNow().catch((err: unknown) => {
        this.logger.error(`[${this.name}] Initial run failed`, { error: serializeError(err) });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    void this.task.stop();
    this.task = null;
    this.status = 'stopped';
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  async triggerNow(): Promise<SchedulerExecutionResult> {
    this.logger.debug(`[${this.name}] Manual trigger requested`);
    return this.runWithErrorHandling();
  }

  private static readonly SLOW_THRESHOLD_MS = 5000;

  private handleSuccessfulExecution(result: SchedulerExecutionResult, startTime: number): SchedulerExecutionResult {
    this.lastRunDurationMs = Date.now() - startTime;
    this.lastRunSuccess = true;

    if (result.noOp) {
      this.skippedCount++;
      this.logger.warn(`[${this.name}] Execution skipped`, { message: result.message, skipped: this.skippedCount });
    } else if (this.lastRunDurationMs > BaseScheduler.SLOW_THRESHOLD_MS) {
      this.logger.warn(`[${this.name}] Slow execution`, {
        durationMs: this.lastRunDurationMs,
        runCount: this.runCount,
        threshold: BaseScheduler.SLOW_THRESHOLD_MS,
      });
    } else {
      this.logger.debug(`[${this.name}] Execution completed`, {
        durationMs: this.lastRunDurationMs,
        runCount: this.runCount,
      });
    }
    return { ...result, durationMs: this.lastRunDurationMs };
  }

  private handleExecutionError(
    error: unknown,
    attempt: number,
    maxAttempts: number,
    startTime: number
  ): SchedulerExecutionResult | null {
    this.lastRunDurationMs = Date.now() - startTime;
    this.lastRunSuccess = false;
    this.errorCount++;

    this.logger.error(`[${this.name}] Execution error`, {
      error: serializeError(error),
      attempt,
      maxAttempts,
      durationMs: this.lastRunDurationMs,
    });

    if (attempt >= maxAttempts) {
      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        durationMs: this.lastRunDurationMs,
      };
    }

    return null;
  }

  private async runWithErrorHandling(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    let attempt = 0;
    const maxAttempts = (this.config.maxRetries || 0) + 1;

    while (attempt < maxAttempts) {
      attempt++;
      try {
        const result = await this.executeWithTimeout();

        if (result.success) {
          return this.handleSuccessfulExecution(result, startTime);
        }

        this.lastRunDurationMs = Date.now() - startTime;
        this.lastRunSuccess = false;
        this.logger.warn(`[${this.name}] Execution failed`, { message: result.message, attempt, maxAttempts });
        if (attempt >= maxAttempts) {
          this.errorCount++;
          return { ...result, durationMs: this.lastRunDurationMs };
        }
        await this.sleep(this.config.retryDelayMs || 1000);
      } catch (error) {
        const errorResult = this.handleExecutionError(error, attempt, maxAttempts, startTime);
        if (errorResult) return errorResult;
        await this.sleep(this.config.retryDelayMs || 1000);
      }
    }

    return {
      success: false,
      message: 'Max retries exceeded',
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Races the execution against the configured timeout. A timed out
   * execution is not cancelled; it keeps running in the background.
   */
  private async executeWithTimeout(): Promise<SchedulerExecutionResult> {
    const timeoutMs = this.config.timeoutMs || 300000;
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const result = await Promise.race([
        this.execute(),
        new Promise<SchedulerExecutionResult>((_, reject) => {
          timer = setTimeout(() => {
            reject(new Error(`Execution timed out after ${timeoutMs}ms`));
          }, timeoutMs);
        }),
      ]);
      return { ...result, durationMs: Date.now() - startTime };
    } finally {
      clearTimeout(timer);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getInfo(): SchedulerInfo {
    return {
      name: this.name,
      cronExpression: this.config.cronExpression,
      status: this.status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      skippedCount: this.skippedCount,
      serviceName: this.serviceName,
    };
  }

  isHealthy(): boolean {
    if (this.status !== 'running') return true;
    if (this.runCount === 0) return true;
    const errorRate = this.errorCount / this.runCount;
    return errorRate < 0.5;
  }
}
