export {
  TraceEnvironment,
  loadTrace,
  parseTrace,
  traceSchema,
  traceSampleSchema,
  type Trace,
  type TraceInput,
  type TraceSample,
} from './trace-environment.js';
