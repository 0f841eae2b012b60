import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const createConsoleMock = (overrides: Partial<Console> = {}): Console => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    ...overrides,
} as unknown as Console);

describe('logging utilities', () => {
    beforeEach(() => {
        vi.resetModules();
        vi.unstubAllGlobals();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('routes log entries to matching console sink', async () => {
        const consoleMock = createConsoleMock();
        vi.stubGlobal('console', consoleMock);
        const { defaultLogWriter } = await import('util/log');

        defaultLogWriter({ level: 'warn', subsystem: 'anomaly', message: 'ball corrected', timestamp: 0 });

        expect(consoleMock.warn).toHaveBeenCalledWith('1970-01-01T00:00:00.000Z [WARN][anomaly] ball corrected');
    });

    it('falls back to console.log when specific sink missing', async () => {
        const fallback = vi.fn();
        const consoleMock = createConsoleMock({ warn: undefined as unknown as Console['warn'], log: fallback });
        vi.stubGlobal('console', consoleMock);
        const { defaultLogWriter } = await import('util/log');

        defaultLogWriter({ level: 'warn', subsystem: 'fallback', message: 'missing sink', timestamp: 0 });

        expect(fallback).toHaveBeenCalledWith('1970-01-01T00:00:00.000Z [WARN][fallback] missing sink');
    });

    it('passes context objects alongside the message', async () => {
        const consoleMock = createConsoleMock();
        vi.stubGlobal('console', consoleMock);
        const { defaultLogWriter } = await import('util/log');

        defaultLogWriter({ level: 'info', subsystem: 'ctx', message: 'payload', timestamp: 0, context: { tick: 42 } });

        expect(consoleMock.info).toHaveBeenCalledWith('1970-01-01T00:00:00.000Z [INFO][ctx] payload', { tick: 42 });
    });

    it('formats entries on a single line with JSON context', async () => {
        const { formatLogEntry } = await import('util/log');

        expect(formatLogEntry({ level: 'error', subsystem: 'config', message: 'rejected', timestamp: 0 }))
            .toBe('1970-01-01T00:00:00.000Z [ERROR][config] rejected');
        expect(formatLogEntry({
            level: 'debug',
            subsystem: 'router',
            message: 'dropped',
            timestamp: 0,
            context: { pair: 'brick|power-up' },
        })).toBe('1970-01-01T00:00:00.000Z [DEBUG][router] dropped {"pair":"brick|power-up"}');
    });

    it('creates loggers that normalise subsystem names and propagate options', async () => {
        const writer = vi.fn();
        const now = vi.fn(() => 123);
        const { createLogger } = await import('util/log');

        const logger = createLogger(' simulation ', { writer, now, minLevel: 'debug' });
        logger.debug('tick');
        logger.error('boom', { reason: 'badness' });

        expect(writer).toHaveBeenNthCalledWith(1, {
            level: 'debug',
            subsystem: 'simulation',
            message: 'tick',
            context: undefined,
            timestamp: 123,
        });
        expect(writer).toHaveBeenNthCalledWith(2, {
            level: 'error',
            subsystem: 'simulation',
            message: 'boom',
            context: { reason: 'badness' },
            timestamp: 123,
        });
    });

    it('drops entries below the minimum level', async () => {
        const writer = vi.fn();
        const { createLogger } = await import('util/log');

        const logger = createLogger('quiet', { writer, now: () => 0, minLevel: 'warn' });
        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');

        expect(writer).toHaveBeenCalledTimes(1);
        expect(writer).toHaveBeenCalledWith(expect.objectContaining({ level: 'warn', message: 'shown' }));
    });

    it('filters debug entries by default', async () => {
        const writer = vi.fn();
        const { createLogger } = await import('util/log');

        createLogger('default', { writer, now: () => 0 }).debug('hidden');

        expect(writer).not.toHaveBeenCalled();
    });

    it('creates child loggers with derived subsystem names and the same level', async () => {
        const writer = vi.fn();
        const now = vi.fn(() => 555);
        const { createLogger } = await import('util/log');

        const parent = createLogger(' breakout ', { writer, now, minLevel: 'info' });
        const child = parent.child(' anomaly ');
        child.debug('hidden');
        child.info('ready');

        expect(writer).toHaveBeenCalledTimes(1);
        expect(writer).toHaveBeenCalledWith({
            level: 'info',
            subsystem: 'breakout:anomaly',
            message: 'ready',
            context: undefined,
            timestamp: 555,
        });
    });
});
