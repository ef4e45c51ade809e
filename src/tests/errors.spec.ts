import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ErrorHandler,
  ExtensionExecutionError,
  ExtensionNotFoundError,
  PipelineError,
  StateError,
  SystemError,
  attempt,
  shouldPropagate
} from '../errors/index.js';
import { createMemoryLogger } from '../log/logger.js';

describe('error kinds', () => {
  it('carry category and context', () => {
    const e = new ExtensionNotFoundError('shell');
    expect(e).toBeInstanceOf(PipelineError);
    expect(e.message).toBe('Extension not found: shell');
    expect(e.info).toEqual({
      message: 'Extension not found: shell',
      severity: 'error',
      category: 'extension',
      context: 'extension.shell',
      details: undefined
    });
  });

  it('keep the cause', () => {
    const root = new Error('disk full');
    const e = new StateError('write failed', { cause: root });
    expect(e.cause).toBe(root);
  });
});

describe('propagation policy', () => {
  it('contains extension errors and propagates the rest', () => {
    expect(shouldPropagate(new ExtensionExecutionError('x', 'a').info)).toBe(false);
    expect(shouldPropagate(new StateError('x').info)).toBe(true);
    expect(shouldPropagate(new ConfigurationError('x').info)).toBe(true);
    expect(shouldPropagate(new ExtensionExecutionError('x', 'a', { severity: 'critical' }).info)).toBe(true);
    expect(shouldPropagate(new StateError('x', { severity: 'warning' }).info)).toBe(false);
    expect(shouldPropagate(new StateError('x', { severity: 'info' }).info)).toBe(false);
  });
});

describe('ErrorHandler', () => {
  it('logs and contains an extension error', () => {
    const { logger, records } = createMemoryLogger();
    const handler = new ErrorHandler(logger);
    handler.handle(new ExtensionExecutionError('boom', 'shell'), 'extension.shell');
    expect(records).toHaveLength(1);
    expect(records[0].level).toBe('error');
    expect(records[0].message).toBe('Error in extension.shell: boom');
  });

  it('appends details to the log line', () => {
    const { logger, records } = createMemoryLogger();
    const handler = new ErrorHandler(logger);
    handler.handle(new ExtensionExecutionError('boom', 'shell', { details: { exit_code: 2 } }), 'x');
    expect(records[0].message).toBe('Error in extension.shell: boom Details: {"exit_code":2}');
  });

  it('rethrows a state error', () => {
    const { logger } = createMemoryLogger();
    const handler = new ErrorHandler(logger);
    const err = new StateError('bad state');
    expect(() => handler.handle(err, 'state')).toThrow(err);
  });

  it('wraps foreign errors as system errors and rethrows', () => {
    const { logger, records } = createMemoryLogger();
    const handler = new ErrorHandler(logger);
    let thrown: unknown;
    try {
      handler.handle(new TypeError('raw'), 'runner');
    } catch (e) {
      thrown = e;
    }
    expect(thrown).toBeInstanceOf(SystemError);
    expect(thrown instanceof SystemError && thrown.info.context).toBe('runner');
    expect(records[0].message).toBe('Error in runner: raw');
  });

  it('logs warnings without throwing', () => {
    const { logger, records } = createMemoryLogger();
    new ErrorHandler(logger).handle(new ConfigurationError('odd value', { severity: 'warning' }), 'configuration');
    expect(records.map(r => r.level)).toEqual(['warn']);
  });

  it('rethrows critical extension errors', () => {
    const { logger, records } = createMemoryLogger();
    const err = new ExtensionExecutionError('meltdown', 'shell', { severity: 'critical' });
    expect(() => new ErrorHandler(logger).handle(err, 'x')).toThrow('meltdown');
    expect(records[0].level).toBe('critical');
  });
});

describe('attempt', () => {
  it('returns the value', async () => {
    expect(await attempt(() => 42, e => new SystemError(String(e), 't'))).toEqual({ ok: true, value: 42 });
  });

  it('wraps foreign errors and passes pipeline errors through', async () => {
    const wrap = (e: unknown) => new ExtensionExecutionError(`wrapped: ${String(e)}`, 'a');
    const foreign = await attempt(() => { throw 'nope'; }, wrap);
    expect(foreign.ok).toBe(false);
    if (!foreign.ok) expect(foreign.error.message).toBe('wrapped: nope');

    const state = new StateError('keep me');
    const own = await attempt(async () => { throw state; }, wrap);
    expect(own).toEqual({ ok: false, error: state });
  });

  it('wraps pipeline errors too when asked', async () => {
    const res = await attempt(() => { throw new StateError('inner'); }, () => new SystemError('outer', 't'), true);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('outer');
  });
});
