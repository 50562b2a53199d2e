import { describe, it, expect } from 'vitest';
import { AgentLoopConfigSchema } from './schemas.js';

describe('AgentLoopConfigSchema', () => {
    it('should fill every default', () => {
        expect(AgentLoopConfigSchema.parse({})).toEqual({
            contextWindow: 200_000,
            maxTurns: 500,
            compaction: {
                onOverflow: 'continue',
                bufferTokens: 20_000,
                preserveLastNTurns: 2,
                maxSummaryTokens: 2000,
            },
            tools: { maxConcurrency: 8, idleTimeoutMs: 120_000, cancelGraceMs: 2000 },
            stream: { toolCallIdleTimeoutMs: 60_000 },
            queue: { capacity: 5 },
        });
    });

    it('should keep nested overrides next to defaults', () => {
        const config = AgentLoopConfigSchema.parse({ tools: { maxConcurrency: 1 } });

        expect(config.tools).toEqual({ maxConcurrency: 1, idleTimeoutMs: 120_000, cancelGraceMs: 2000 });
    });

    it('should reject unknown keys', () => {
        expect(AgentLoopConfigSchema.safeParse({ maxTurn: 3 }).success).toBe(false);
        expect(AgentLoopConfigSchema.safeParse({ queue: { size: 3 } }).success).toBe(false);
    });

    it('should reject a buffer that leaves no budget', () => {
        const result = AgentLoopConfigSchema.safeParse({
            contextWindow: 1000,
            compaction: { bufferTokens: 1000 },
        });

        expect(result.success).toBe(false);
        expect(result.error?.issues[0]?.path).toEqual(['compaction', 'bufferTokens']);
    });
});
