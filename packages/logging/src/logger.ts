import type {Writable} from 'node:stream';

import {
  LOG_EVENT_NAME_PATTERN,
  LogEventLevelSchema,
  LogEventSchema,
  type LogEvent,
  type LogEventLevel
} from '@cluster-gateway/schemas';
import {z} from 'zod';

import {currentLogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export const LogEventInputSchema = z
  .object({
    level: LogEventLevelSchema,
    event: z.string().regex(LOG_EVENT_NAME_PATTERN),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;
type LevelledInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
} & Record<LogEventLevel, (input: LevelledInput) => void>;

export type StructuredLogWriter = {
  stdout: Writable;
  stderr: Writable;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

const streamFor = (level: LogEventLevel, writer: StructuredLogWriter) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

/**
 * JSON-lines logger for the gateway. Each line is checked against
 * `LogEventSchema`; request fields come from the active log context and
 * `metadata` is passed through `sanitizeForLog`. error and fatal go to stderr.
 */
export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_WEIGHT[LogLevelSchema.parse(options.level)];
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const now = options.now ?? (() => new Date());
  const writer = options.writer ?? {stdout: process.stdout, stderr: process.stderr};
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const toEvent = (input: LogEventInput): LogEvent | undefined => {
    const context = currentLogContext();
    const event = LogEventSchema.safeParse({
      ts: now().toISOString(),
      level: input.level,
      service,
      env,
      event: input.event,
      component: input.component,
      correlation_id: context?.correlation_id ?? 'n/a',
      request_id: context?.request_id ?? 'n/a',
      method: context?.method,
      route: input.route ?? context?.route,
      path_params: context?.path_params,
      message: input.message,
      reason_code: input.reason_code,
      status_code: input.status_code,
      duration_ms: input.duration_ms,
      metadata: sanitizeForLog({value: input.metadata ?? {}, extraSensitiveKeys})
    });
    return event.success ? event.data : undefined;
  };

  const log = (input: LogEventInput) => {
    if (LEVEL_WEIGHT[input.level] < threshold) {
      return;
    }

    const parsed = LogEventInputSchema.safeParse(input);
    const event = parsed.success ? toEvent(parsed.data) : undefined;
    if (!event) {
      // Rejected input is reported on stderr; logging never throws.
      writer.stderr.write(
        `${JSON.stringify({
          ts: now().toISOString(),
          level: 'error',
          service,
          env,
          event: 'logger.event.rejected',
          rejected_event: String(input.event)
        })}\n`
      );
      return;
    }

    streamFor(event.level, writer).write(`${JSON.stringify(event)}\n`);
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

const ignore = () => undefined;

export const createNoopLogger = (): StructuredLogger => ({
  log: ignore,
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
  fatal: ignore
});
