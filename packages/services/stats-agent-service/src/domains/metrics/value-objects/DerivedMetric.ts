/**
 * One reported value, ready for an emitter.
 */
export interface DerivedMetric {
  readonly name: string;
  readonly units: string;
  readonly value: number;
}

export function nodeMetricName(name: string, nodeIdentifier: string): string {
  return `${name}/${nodeIdentifier}`;
}
