// ---------------------------------------------------------------------------
// Tabular output: one CSV row per StepRecord
// ---------------------------------------------------------------------------

import { writeFileSync } from 'node:fs';
import { ValidationError } from '../errors.js';
import type { StepRecord } from '../types.js';

/** Default output location, relative to the working directory. */
export const DEFAULT_OUTPUT_PATH = 'sim_results_summary.csv';

/** Column order of the results table. */
export const RESULT_COLUMNS = ['Time', 'CGM', 'Meal', 'Insulin_Basal', 'Insulin_Bolus'] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;
// Shape produced by Date#toISOString.
const ISO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

function escapeField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatTime(time: StepRecord['time']): string {
  if (time instanceof Date) return time.toISOString();
  return String(time);
}

/** Render records as CSV text: header row, then one row per record, `\n` terminated. */
export function formatResultsCsv(records: readonly StepRecord[]): string {
  const rows: string[] = [RESULT_COLUMNS.join(',')];
  for (const r of records) {
    rows.push(
      [formatTime(r.time), String(r.glucose), String(r.meal), String(r.basal), String(r.bolus)]
        .map(escapeField)
        .join(','),
    );
  }
  return rows.join('\n') + '\n';
}

/** Write the results table to `path`, replacing any existing file. */
export function writeResultsCsv(path: string, records: readonly StepRecord[]): void {
  writeFileSync(path, formatResultsCsv(records), 'utf8');
}

/** Split one CSV line into fields, honouring double-quoted fields. */
function splitLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (line.charAt(i + 1) === '"') {
          current += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function parseTime(field: string): StepRecord['time'] {
  if (NUMERIC_PATTERN.test(field)) return Number(field);
  if (ISO_DATETIME_PATTERN.test(field)) {
    const ms = Date.parse(field);
    if (Number.isFinite(ms)) return new Date(ms);
  }
  return field;
}

function parseNumber(field: string, column: ResultColumn, row: number): number {
  const value = Number(field);
  if (field.trim() === '' || !Number.isFinite(value)) {
    throw new ValidationError(`csv row ${row} ${column}`, field, 'not a finite number');
  }
  return value;
}

/**
 * Parse text produced by {@link formatResultsCsv} back into records. A numeric
 * `Time` becomes a number, an ISO-8601 UTC datetime becomes a `Date`, and any
 * other `Time` is kept as its string.
 *
 * @throws ValidationError on a wrong header, a short/long row or a non-numeric value.
 */
export function parseResultsCsv(text: string): StepRecord[] {
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0);
  const header = lines[0];
  if (header === undefined || header !== RESULT_COLUMNS.join(',')) {
    throw new ValidationError('csv header', header, `expected "${RESULT_COLUMNS.join(',')}"`);
  }

  const records: StepRecord[] = [];
  for (let i = 1; i < lines.length; i++) {
    const fields = splitLine(lines[i] ?? '');
    if (fields.length !== RESULT_COLUMNS.length) {
      throw new ValidationError(`csv row ${i}`, lines[i], `expected ${RESULT_COLUMNS.length} fields, got ${fields.length}`);
    }
    const [time = '', cgm = '', meal = '', basal = '', bolus = ''] = fields;
    records.push({
      time: parseTime(time),
      glucose: parseNumber(cgm, 'CGM', i),
      meal: parseNumber(meal, 'Meal', i),
      basal: parseNumber(basal, 'Insulin_Basal', i),
      bolus: parseNumber(bolus, 'Insulin_Bolus', i),
    });
  }
  return records;
}
