/**
 * OpenTelemetry Integration Tests
 */

import { SpanKind, trace, type Span } from '@opentelemetry/api';
import { afterEach, expect, test, vi } from 'vitest';
import { respond } from '../../framework/http/response.ts';
import { SpanStatusCode, TRACER_NAME, recordSpanError, withSpan } from '../../framework/telemetry/otel.ts';
import { createDispatcher, createRequest, recordingUnit } from './helpers.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

function fakeSpan(): Span {
  return {
    spanContext: vi.fn(),
    setAttribute: vi.fn(),
    setAttributes: vi.fn(),
    addEvent: vi.fn(),
    addLink: vi.fn(),
    addLinks: vi.fn(),
    setStatus: vi.fn(),
    updateName: vi.fn(),
    end: vi.fn(),
    isRecording: vi.fn(() => true),
    recordException: vi.fn(),
  };
}

/**
 * Route every span started through the global API to `span`
 */
function installTracer(span: Span) {
  const startActiveSpan = vi.fn().mockImplementation((...args: unknown[]) => {
    const fn = args[args.length - 1];
    return typeof fn === 'function' ? fn(span) : undefined;
  });
  const getTracer = vi.spyOn(trace, 'getTracer').mockReturnValue({ startSpan: vi.fn(), startActiveSpan });
  return { startActiveSpan, getTracer };
}

test('withSpan - returns the result and ends the span with OK status', async () => {
  const span = fakeSpan();
  const { startActiveSpan, getTracer } = installTracer(span);

  const result = await withSpan('work', { 'job.id': 7 }, () => Promise.resolve('done'));

  expect(result).toBe('done');
  expect(getTracer).toHaveBeenCalledWith(TRACER_NAME);
  expect(startActiveSpan).toHaveBeenCalledWith(
    'work',
    { kind: SpanKind.INTERNAL, attributes: { 'job.id': 7 } },
    expect.any(Function)
  );
  expect(span.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
  expect(span.end).toHaveBeenCalledTimes(1);
});

test('withSpan - records the error and rethrows it', async () => {
  const span = fakeSpan();
  installTracer(span);
  const error = new Error('boom');

  await expect(withSpan('work', {}, () => Promise.reject(error))).rejects.toBe(error);

  expect(span.recordException).toHaveBeenCalledWith(error);
  expect(span.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR, message: 'boom' });
  expect(span.end).toHaveBeenCalledTimes(1);
});

test('withSpan - runs without a registered provider', async () => {
  expect(await withSpan('noop', {}, (span) => Promise.resolve(span.isRecording()))).toBe(false);
});

test('recordSpanError - stringifies non-errors', () => {
  const span = fakeSpan();

  recordSpanError(span, 'timeout');

  expect(span.recordException).toHaveBeenCalledWith('timeout');
  expect(span.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR, message: 'timeout' });
});

test('Dispatcher - describes the dispatch on its span', async () => {
  const span = fakeSpan();
  const { startActiveSpan } = installTracer(span);
  const calls: string[] = [];
  const dispatcher = createDispatcher([
    recordingUnit('session', calls),
    recordingUnit('auth', calls, { processRequest: () => respond().status(401).text('login') }),
  ]);

  await dispatcher.dispatch(createRequest('/account', { method: 'POST' }), {
    handler: () => respond().text('never'),
  });

  expect(startActiveSpan).toHaveBeenCalledWith(
    'strata.dispatch',
    {
      kind: SpanKind.INTERNAL,
      attributes: { 'http.request.method': 'POST', 'url.path': '/account', 'strata.chain.length': 2 },
    },
    expect.any(Function)
  );
  expect(vi.mocked(span.setAttribute).mock.calls).toEqual([
    ['strata.response.origin', 'request'],
    ['strata.short_circuit', 'request'],
    ['strata.response.kind', 'materialized'],
  ]);
});

test('Dispatcher - a view response is not a short circuit', async () => {
  const span = fakeSpan();
  installTracer(span);

  await createDispatcher([]).dispatch(createRequest('/'), {
    handler: () => respond().stream(['a', 'b']),
  });

  expect(vi.mocked(span.setAttribute).mock.calls).toEqual([
    ['strata.response.origin', 'view'],
    ['strata.response.kind', 'streaming'],
  ]);
});
