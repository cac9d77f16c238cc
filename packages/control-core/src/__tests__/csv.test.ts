import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  formatResultsCsv,
  parseResultsCsv,
  writeResultsCsv,
  RESULT_COLUMNS,
} from '../output/index.js';
import { ValidationError } from '../errors.js';
import type { StepRecord } from '../types.js';

const rows: StepRecord[] = [
  { time: 0, glucose: 120.4, meal: 30, basal: 0.05, bolus: 1 },
  { time: 1, glucose: 118.25, meal: 0, basal: 0.05, bolus: 0 },
  { time: 2, glucose: 65, meal: 0, basal: 0, bolus: 0 },
];

describe('results CSV', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'glucoloop-csv-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the header in column order', () => {
    expect(RESULT_COLUMNS).toEqual(['Time', 'CGM', 'Meal', 'Insulin_Basal', 'Insulin_Bolus']);
    expect(formatResultsCsv([])).toBe('Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n');
  });

  it('writes one row per record', () => {
    expect(formatResultsCsv(rows)).toBe(
      'Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n' +
        '0,120.4,30,0.05,1\n' +
        '1,118.25,0,0.05,0\n' +
        '2,65,0,0,0\n',
    );
  });

  it('renders clock times as ISO-8601', () => {
    const text = formatResultsCsv([
      { time: new Date('2024-01-01T00:05:00.000Z'), glucose: 100, meal: 0, basal: 0.05, bolus: 0 },
    ]);
    expect(text.split('\n')[1]).toBe('2024-01-01T00:05:00.000Z,100,0,0.05,0');
  });

  it('round-trips records through a file', () => {
    const path = join(dir, 'results.csv');
    writeResultsCsv(path, rows);
    expect(parseResultsCsv(readFileSync(path, 'utf8'))).toEqual(rows);
  });

  it('round-trips clock-timed records through a file', () => {
    const path = join(dir, 'timed.csv');
    const timed: StepRecord[] = [
      { time: new Date('2024-01-01T00:05:00.000Z'), glucose: 120.4, meal: 30, basal: 0.05, bolus: 1 },
      { time: new Date('2024-01-01T00:10:00.000Z'), glucose: 65, meal: 0, basal: 0, bolus: 0 },
    ];
    writeResultsCsv(path, timed);
    const parsed = parseResultsCsv(readFileSync(path, 'utf8'));
    expect(parsed).toEqual(timed);
    expect(parsed[0]?.time).toBeInstanceOf(Date);
  });

  it('keeps a time that only looks like a date as a string', () => {
    const text = 'Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n2024-01-01,100,0,0.05,0\n';
    expect(parseResultsCsv(text)[0]?.time).toBe('2024-01-01');
  });

  it('overwrites an existing file', () => {
    const path = join(dir, 'results.csv');
    writeFileSync(path, 'stale contents\n');
    writeResultsCsv(path, rows.slice(0, 1));
    expect(readFileSync(path, 'utf8')).toBe('Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n0,120.4,30,0.05,1\n');
  });

  it('quotes and unquotes string times containing commas', () => {
    const text = formatResultsCsv([{ time: 'day 1, 08:00', glucose: 99, meal: 0, basal: 0.05, bolus: 0 }]);
    expect(text.split('\n')[1]).toBe('"day 1, 08:00",99,0,0.05,0');
    expect(parseResultsCsv(text)[0]?.time).toBe('day 1, 08:00');
  });

  it('rejects an unexpected header', () => {
    expect(() => parseResultsCsv(',Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n')).toThrow(ValidationError);
  });

  it('rejects a short row', () => {
    expect(() => parseResultsCsv('Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n0,100,0\n')).toThrow(ValidationError);
  });

  it('rejects a non-numeric glucose value', () => {
    expect(() => parseResultsCsv('Time,CGM,Meal,Insulin_Basal,Insulin_Bolus\n0,high,0,0.05,0\n')).toThrow(
      'Invalid csv row 1 CGM: not a finite number',
    );
  });
});
