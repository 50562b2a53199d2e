import type { StepwiseRuntimeError } from '../errors/runtime-error.js';
import type { CycleStopReason } from '../events/index.js';
import type { TokenUsage } from '../llm/types.js';

/**
 * A prompt waiting for the running cycle to finish
 */
export interface QueuedPrompt {
    readonly id: string;
    readonly content: string;
    readonly queuedAt: number;
}

/**
 * How one prompt cycle ended
 */
export interface CycleResult {
    promptId: string;
    stopReason: CycleStopReason;
    /** Provider calls made during the cycle */
    turns: number;
    /** Summed across all turns of the cycle */
    usage: TokenUsage;
    error?: StepwiseRuntimeError | undefined;
}

