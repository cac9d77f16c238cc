import { describe, it, expect } from 'vitest';
import { computeStatistics, formatReport } from '../driver/index.js';
import { EmptyResultError } from '../errors.js';
import type { StepRecord } from '../types.js';

function records(...glucose: number[]): StepRecord[] {
  return glucose.map((g, i) => ({ time: i, glucose: g, meal: 0, basal: 0.05, bolus: 0 }));
}

describe('computeStatistics', () => {
  it('computes mean, min and max of the glucose column', () => {
    const stats = computeStatistics(records(100, 150, 200));
    expect(stats.mean).toBe(150);
    expect(stats.min).toBe(100);
    expect(stats.max).toBe(200);
  });

  it('splits steps into low / in range / high with inclusive bounds', () => {
    const stats = computeStatistics(records(60, 70, 180, 181));
    expect(stats.lowFraction).toBe(0.25);
    expect(stats.inRangeFraction).toBe(0.5);
    expect(stats.highFraction).toBe(0.25);
  });

  it('honours a custom target range', () => {
    const stats = computeStatistics(records(90, 110, 130, 150), { low: 100, high: 140 });
    expect(stats.lowFraction).toBe(0.25);
    expect(stats.inRangeFraction).toBe(0.5);
    expect(stats.highFraction).toBe(0.25);
  });

  it('signals an empty series instead of returning NaN', () => {
    expect(() => computeStatistics([])).toThrow(EmptyResultError);
  });
});

describe('formatReport', () => {
  it('renders one-decimal values between separator lines', () => {
    const lines = formatReport({
      mean: 123.456,
      min: 65,
      max: 180.04,
      lowFraction: 0.1,
      inRangeFraction: 0.75,
      highFraction: 0.15,
    });
    expect(lines).toEqual([
      '------------------------------',
      'SIMULATION REPORT',
      'Mean Glucose: 123.5 mg/dL',
      'Min Glucose:  65.0 mg/dL',
      'Max Glucose:  180.0 mg/dL',
      'Time in range: 75.0% (low 10.0%, high 15.0%)',
      '------------------------------',
    ]);
  });
});
