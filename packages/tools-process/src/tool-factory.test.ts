import { describe, it, expect, vi } from 'vitest';
import * as os from 'node:os';
import type { ToolExecutionContext } from '@stepwise/core';
import { createSilentMockLogger } from '@stepwise/core/test-utils';
import { createProcessTools } from './tool-factory.js';

describe('createProcessTools', () => {
    const createTool = () => {
        const [tool] = createProcessTools({
            config: { workingDirectory: os.tmpdir() },
            logger: createSilentMockLogger(),
        });
        if (!tool) throw new Error('bash_exec was not created');
        return tool;
    };

    it('creates bash_exec with its alias', () => {
        const tool = createTool();

        expect(tool.id).toBe('bash_exec');
        expect(tool.aliases).toEqual(['bash']);
    });

    it('rejects invalid configuration', () => {
        expect(() =>
            createProcessTools({
                config: { maxTimeout: 700000 },
                logger: createSilentMockLogger(),
            })
        ).toThrow();
    });

    it('validates input', () => {
        const tool = createTool();

        expect(tool.inputSchema.safeParse({ command: '' }).success).toBe(false);
        expect(tool.inputSchema.safeParse({ command: 'ls', timeout: 700000 }).success).toBe(false);
        expect(tool.inputSchema.safeParse({ command: 'ls', extra: true }).success).toBe(false);
    });

    it.skipIf(process.platform === 'win32')(
        'reports progress while the command writes output',
        async () => {
            const tool = createTool();
            const reportProgress = vi.fn();
            const context: ToolExecutionContext = {
                toolCallId: 'call-1',
                abortSignal: new AbortController().signal,
                reportProgress,
                logger: createSilentMockLogger(),
            };

            const result = await tool.execute(
                tool.inputSchema.parse({ command: 'echo one; echo two 1>&2' }),
                context
            );

            expect(result).toMatchObject({ stdout: 'one\n', stderr: 'two\n', exit_code: 0 });
            expect(result).not.toHaveProperty('truncated');
            expect(reportProgress).toHaveBeenCalled();
        }
    );
});
