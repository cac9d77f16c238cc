// ---------------------------------------------------------------------------
// Summary statistics over a recorded time series
// ---------------------------------------------------------------------------

import { EmptyResultError } from '../errors.js';
import type { StepRecord, SummaryStatistics, TargetRange } from '../types.js';

export const DEFAULT_TARGET_RANGE: Readonly<TargetRange> = { low: 70, high: 180 };

/**
 * Mean / min / max of the glucose column plus the fraction of steps below,
 * inside and above `range` (bounds inclusive to the in-range band).
 *
 * @throws EmptyResultError when `records` is empty.
 */
export function computeStatistics(
  records: readonly StepRecord[],
  range: TargetRange = DEFAULT_TARGET_RANGE,
): SummaryStatistics {
  if (records.length === 0) {
    throw new EmptyResultError(0);
  }

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  let below = 0;
  let above = 0;

  for (const { glucose } of records) {
    sum += glucose;
    if (glucose < min) min = glucose;
    if (glucose > max) max = glucose;
    if (glucose < range.low) below++;
    else if (glucose > range.high) above++;
  }

  const n = records.length;
  return {
    mean: sum / n,
    min,
    max,
    lowFraction: below / n,
    inRangeFraction: (n - below - above) / n,
    highFraction: above / n,
  };
}

/** Report block: separator, title, one-decimal mean/min/max, separator. */
export function formatReport(statistics: SummaryStatistics): string[] {
  const separator = '-'.repeat(30);
  return [
    separator,
    'SIMULATION REPORT',
    `Mean Glucose: ${statistics.mean.toFixed(1)} mg/dL`,
    `Min Glucose:  ${statistics.min.toFixed(1)} mg/dL`,
    `Max Glucose:  ${statistics.max.toFixed(1)} mg/dL`,
    `Time in range: ${(statistics.inRangeFraction * 100).toFixed(1)}% ` +
      `(low ${(statistics.lowFraction * 100).toFixed(1)}%, high ${(statistics.highFraction * 100).toFixed(1)}%)`,
    separator,
  ];
}
