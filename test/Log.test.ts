import { describe, it, expect, vi } from 'vitest';
import { LogLevel, SetLogLevel, log } from '../src/Common/Log.js';

describe('Log', () => {
    it('should drop messages below the minimum level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        SetLogLevel('warn');

        log.info('hidden', 'Test');
        log.warning('shown', 'Test', 'ctx-1');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0]).toMatch(/^\[.+\] \[WARNING\] \[Test\] \[ctx-1\] shown$/);
    });

    it('should route errors and criticals to console.error', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        SetLogLevel(LogLevel.Debug);

        log.error('failed', 'Test');
        log.critical('down', 'Test');

        expect(error).toHaveBeenCalledTimes(2);
    });
});
