export {
  formatResultsCsv,
  parseResultsCsv,
  writeResultsCsv,
  DEFAULT_OUTPUT_PATH,
  RESULT_COLUMNS,
  type ResultColumn,
} from './csv.js';
