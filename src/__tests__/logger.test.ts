import { describe, it, expect, afterEach } from 'vitest';
import { getLogger, initLogger, resetLogger } from '../utils/logger.js';

interface LogEntry {
    level: number;
    msg: string;
    service: string;
    err?: { type: string; message: string; stack: string };
}

function captureLogs(): { lines: LogEntry[]; write(msg: string): void } {
    const lines: LogEntry[] = [];
    return {
        lines,
        write(msg: string) {
            lines.push(JSON.parse(msg) as LogEntry);
        },
    };
}

describe('Logger', () => {
    afterEach(() => {
        resetLogger();
    });

    it('should be silent under the test runner until configured', () => {
        expect(getLogger().level).toBe('silent');
    });

    it('should serialize errors logged under err', () => {
        const sink = captureLogs();
        initLogger({ level: 'info', destination: sink });

        getLogger().error({ err: new Error('disk full') }, 'Failed to write cache entry');

        expect(sink.lines).toHaveLength(1);
        expect(sink.lines[0]).toMatchObject({
            level: 50,
            msg: 'Failed to write cache entry',
            service: 'ai-research-hub',
            err: { type: 'Error', message: 'disk full' },
        });
        expect(sink.lines[0]?.err?.stack).toContain('disk full');
    });

    it('should drop entries below the configured level', () => {
        const sink = captureLogs();
        initLogger({ level: 'warn', destination: sink });

        getLogger().info('ignored');
        getLogger().warn('kept');

        expect(sink.lines.map((line) => line.msg)).toEqual(['kept']);
    });
});
