const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Converts a fixed interval into the closest node-cron expression.
 * Sub-minute intervals use the seconds field; intervals that do not divide
 * the enclosing unit evenly fire on the unit boundary as well.
 */
export function intervalToCronExpression(intervalMs: number): string {
  const seconds = Math.max(1, Math.round(intervalMs / 1000));
  if (seconds < 60) {
    return `*/${seconds} * * * * *`;
  }
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) {
    return `*/${minutes} * * * *`;
  }
  const hours = Math.round(minutes / 60);
  if (hours < 24) {
    return `0 */${hours} * * *`;
  }
  return '0 0 * * *';
}

/**
 * True when `intervalToCronExpression` fires at exactly this interval: a whole
 * number of seconds, minutes or hours that divides the next unit evenly, or
 * one day.
 */
export function isExactCronInterval(intervalMs: number): boolean {
  if (!Number.isInteger(intervalMs) || intervalMs <= 0) return false;
  if (intervalMs === DAY_MS) return true;

  const steps: Array<[unit: number, span: number]> = [
    [SECOND_MS, MINUTE_MS],
    [MINUTE_MS, HOUR_MS],
    [HOUR_MS, DAY_MS],
  ];
  return steps.some(([unit, span]) => intervalMs % unit === 0 && intervalMs < span && span % intervalMs === 0);
}
