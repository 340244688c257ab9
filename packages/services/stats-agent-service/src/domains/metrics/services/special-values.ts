import type { NodeStats } from '@clusterwatch/shared-contracts';

type SwapStats = NonNullable<NonNullable<NodeStats['os']>['swap']>;

/** used / (used + free); 0 when either operand is missing or the total is 0 */
export function swapUsedRatio(swap: SwapStats | undefined): number {
  const used = swap?.used_in_bytes;
  const free = swap?.free_in_bytes;
  if (used === undefined || free === undefined) return 0;

  const total = used + free;
  if (total === 0) return 0;
  return used / total;
}

/** The one-minute load average, or undefined when the node reports none */
export function firstLoadAverage(loadAverage: readonly number[] | undefined): number | undefined {
  if (!loadAverage || loadAverage.length === 0) return undefined;
  return loadAverage[0];
}
