/**
 * Telemetry
 *
 * Structured logging and OpenTelemetry spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createSilentLogger,
  serializeError,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type SerializedError,
} from './logger.ts';

export {
  TRACER_NAME,
  getTracer,
  withSpan,
  recordSpanError,
  SpanStatusCode,
  type Attributes,
  type Span,
} from './otel.ts';
