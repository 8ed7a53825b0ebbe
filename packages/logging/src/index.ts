export {runWithLogContext, setLogContextFields} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  LogLevelSchema,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';
