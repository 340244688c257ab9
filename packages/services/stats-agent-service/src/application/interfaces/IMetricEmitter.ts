export interface IMetricEmitter {
  emit(name: string, units: string, value: number): void | Promise<void>;
  /**
   * Withdraws everything emitted so far. Called before a cycle emits and when
   * a cycle fails, so that values a cycle did not report are not served.
   */
  clear?(): void | Promise<void>;
}
