import type { AgentEvent, TurnEndReason } from '../../events/index.js';
import type { StepwiseRuntimeError } from '../../errors/runtime-error.js';
import type { ContentBlock } from '../../context/types.js';
import type { ToolCall } from '../../tools/types.js';
import type { FinishReason, StreamPart, TokenUsage } from '../types.js';
import { LLMError } from '../errors.js';

export type TurnState = 'idle' | 'thinking' | 'generating' | 'tool-call-accumulating' | 'sealed';

/**
 * A finished turn. `toolCalls` lists the calls that reached `tool-call-end`, in that order.
 */
export interface SealedTurn {
    turn: number;
    reason: TurnEndReason;
    events: readonly AgentEvent[];
    content: readonly ContentBlock[];
    toolCalls: readonly ToolCall[];
    finishReason?: FinishReason | undefined;
    usage?: TokenUsage | undefined;
    error?: StepwiseRuntimeError | undefined;
}

export interface TurnEngineOptions {
    /** Emit `llm:tool-args-tokens` every N argument deltas of a call */
    tokenEventEvery?: number | undefined;
    /** Only once a call's estimated argument tokens exceed this */
    tokenEventThreshold?: number | undefined;
}

const DEFAULT_TOKEN_EVENT_EVERY = 4;
const DEFAULT_TOKEN_EVENT_THRESHOLD = 20;

interface OpenToolCall {
    id: string;
    name: string;
    raw: string;
    deltas: number;
    estimatedTokens: number;
}

type OpenBlock =
    | { type: 'thinking'; text: string; signature?: string | undefined }
    | { type: 'text'; text: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse accumulated tool-call arguments. An empty payload means no arguments.
 */
export function parseToolArguments(raw: string): {
    arguments: Record<string, unknown>;
    error?: string | undefined;
} {
    if (raw.trim() === '') return { arguments: {} };
    try {
        const parsed: unknown = JSON.parse(raw);
        if (isRecord(parsed)) return { arguments: parsed };
        return { arguments: {}, error: 'Tool arguments must be a JSON object' };
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { arguments: {}, error: `Tool arguments are not valid JSON: ${reason}` };
    }
}

/**
 * Per-turn state machine turning stream parts into balanced start/delta/end events.
 *
 * Synchronous and side-effect free: `push` returns the events caused by one part, in
 * order, and the caller publishes them. Thinking and text blocks are exclusive (opening
 * one closes the other, and a tool-call start closes either); tool calls are tracked
 * per id so they may interleave. The last event of every turn is `turn:end`.
 */
export class TurnEngine {
    private state: TurnState = 'idle';
    private openBlock: OpenBlock | null = null;
    private readonly blocks: ContentBlock[] = [];
    private readonly openCalls = new Map<string, OpenToolCall>();
    private readonly endedCallIds = new Set<string>();
    private readonly completedCalls: ToolCall[] = [];
    private readonly events: AgentEvent[] = [];
    private reason: TurnEndReason | undefined;
    private finishReason: FinishReason | undefined;
    private usage: TokenUsage | undefined;
    private error: StepwiseRuntimeError | undefined;
    private readonly tokenEventEvery: number;
    private readonly tokenEventThreshold: number;

    constructor(
        readonly turn: number,
        options: TurnEngineOptions = {}
    ) {
        this.tokenEventEvery = options.tokenEventEvery ?? DEFAULT_TOKEN_EVENT_EVERY;
        this.tokenEventThreshold = options.tokenEventThreshold ?? DEFAULT_TOKEN_EVENT_THRESHOLD;
    }

    getState(): TurnState {
        return this.state;
    }

    isSealed(): boolean {
        return this.state === 'sealed';
    }

    /** Whether any tool call has started and not yet ended */
    hasOpenToolCalls(): boolean {
        return this.openCalls.size > 0;
    }

    /**
     * Feed one part. Parts after the turn is sealed are ignored.
     */
    push(part: StreamPart): AgentEvent[] {
        if (this.isSealed()) return [];
        const out: AgentEvent[] = [];

        switch (part.type) {
            case 'thinking-delta':
                this.onThinking(part.delta, part.signature, out);
                break;
            case 'text-delta':
                this.onText(part.delta, out);
                break;
            case 'tool-call-start':
                this.onToolCallStart(part.toolCallId, part.toolName, out);
                break;
            case 'tool-call-delta':
                this.onToolCallDelta(part.toolCallId, part.delta, out);
                break;
            case 'tool-call-end':
                this.onToolCallEnd(part.toolCallId, out);
                break;
            case 'stream-done':
                this.onStreamDone(part.finishReason, part.usage, out);
                break;
            case 'stream-error':
                this.closeOpen(out);
                this.fail(part.error, out);
                break;
        }

        return this.record(out);
    }

    /**
     * Seal the turn as cancelled, closing everything still open.
     */
    cancel(): AgentEvent[] {
        if (this.isSealed()) return [];
        const out: AgentEvent[] = [];
        this.closeOpen(out);
        this.seal('cancelled', out);
        return this.record(out);
    }

    /**
     * The tool-call stream went quiet for `timeoutMs`. Calls that already ended are kept
     * and the rest discarded; with nothing to keep the turn fails.
     */
    stall(timeoutMs: number): AgentEvent[] {
        if (this.isSealed()) return [];
        const out: AgentEvent[] = [];
        const seconds = Math.round(timeoutMs / 1000);
        out.push({
            type: 'llm:warning',
            turn: this.turn,
            message: `Tool-call stream stalled for ${seconds}s; continuing with collected arguments.`,
        });
        this.closeOpen(out);
        if (this.completedCalls.length > 0) {
            this.seal('tool-calls-pending', out);
        } else {
            this.fail(LLMError.malformedStream('tool-call stream stalled', { timeoutMs }), out);
        }
        return this.record(out);
    }

    result(): SealedTurn {
        if (this.reason === undefined) {
            throw new Error(`Turn ${this.turn} has not been sealed`);
        }
        return {
            turn: this.turn,
            reason: this.reason,
            events: this.events.slice(),
            content: this.blocks.slice(),
            toolCalls: this.completedCalls.slice(),
            ...(this.finishReason !== undefined && { finishReason: this.finishReason }),
            ...(this.usage !== undefined && { usage: this.usage }),
            ...(this.error !== undefined && { error: this.error }),
        };
    }

    private onThinking(delta: string, signature: string | undefined, out: AgentEvent[]): void {
        if (this.openBlock?.type !== 'thinking') {
            this.closeBlock(out);
            this.openBlock = { type: 'thinking', text: '' };
            out.push({ type: 'llm:thinking-start', turn: this.turn });
        }
        if (this.openBlock.type === 'thinking') {
            this.openBlock.text += delta;
            if (signature !== undefined) this.openBlock.signature = signature;
        }
        out.push({ type: 'llm:thinking-delta', turn: this.turn, delta });
        this.state = 'thinking';
    }

    private onText(delta: string, out: AgentEvent[]): void {
        if (this.openBlock?.type !== 'text') {
            this.closeBlock(out);
            this.openBlock = { type: 'text', text: '' };
            out.push({ type: 'llm:text-start', turn: this.turn });
        }
        this.openBlock.text += delta;
        out.push({ type: 'llm:text-delta', turn: this.turn, delta });
        this.state = 'generating';
    }

    private onToolCallStart(toolCallId: string, toolName: string, out: AgentEvent[]): void {
        if (this.openCalls.has(toolCallId) || this.endedCallIds.has(toolCallId)) {
            this.violation(`duplicate start for tool call '${toolCallId}'`, toolCallId, out);
            return;
        }
        this.closeBlock(out);
        this.openCalls.set(toolCallId, {
            id: toolCallId,
            name: toolName,
            raw: '',
            deltas: 0,
            estimatedTokens: 0,
        });
        out.push({ type: 'llm:tool-start', turn: this.turn, toolCallId, toolName });
        this.state = 'tool-call-accumulating';
    }

    private onToolCallDelta(toolCallId: string, delta: string, out: AgentEvent[]): void {
        const call = this.openCalls.get(toolCallId);
        if (!call) {
            this.violation(
                this.endedCallIds.has(toolCallId)
                    ? `argument delta after end of tool call '${toolCallId}'`
                    : `argument delta for unknown tool call '${toolCallId}'`,
                toolCallId,
                out
            );
            return;
        }
        call.raw += delta;
        call.deltas++;
        call.estimatedTokens += Math.floor(delta.length / 4);
        out.push({ type: 'llm:tool-args-delta', turn: this.turn, toolCallId, delta });
        if (
            call.deltas % this.tokenEventEvery === 0 &&
            call.estimatedTokens > this.tokenEventThreshold
        ) {
            out.push({
                type: 'llm:tool-args-tokens',
                turn: this.turn,
                toolCallId,
                tokens: call.estimatedTokens,
            });
        }
    }

    private onToolCallEnd(toolCallId: string, out: AgentEvent[]): void {
        const call = this.openCalls.get(toolCallId);
        if (!call) {
            this.violation(
                this.endedCallIds.has(toolCallId)
                    ? `duplicate end for tool call '${toolCallId}'`
                    : `end for unknown tool call '${toolCallId}'`,
                toolCallId,
                out
            );
            return;
        }
        this.openCalls.delete(toolCallId);
        this.endedCallIds.add(toolCallId);

        const parsed = parseToolArguments(call.raw);
        this.completedCalls.push({
            id: call.id,
            name: call.name,
            rawArguments: call.raw,
            arguments: parsed.arguments,
            ...(parsed.error !== undefined && { argumentsError: parsed.error }),
            status: 'pending',
        });
        out.push({
            type: 'llm:tool-end',
            turn: this.turn,
            toolCallId,
            toolName: call.name,
            status: 'complete',
        });
        if (this.openCalls.size === 0 && this.openBlock === null) {
            this.state = 'idle';
        }
    }

    private onStreamDone(
        finishReason: FinishReason,
        usage: TokenUsage | undefined,
        out: AgentEvent[]
    ): void {
        this.finishReason = finishReason;
        this.usage = usage;
        this.closeBlock(out);

        if (this.openCalls.size > 0) {
            const pending = [...this.openCalls.keys()];
            this.discardOpenCalls(out);
            this.fail(
                LLMError.malformedStream('stream ended with unterminated tool-call arguments', {
                    toolCallIds: pending,
                }),
                out
            );
            return;
        }

        this.seal(this.completedCalls.length > 0 ? 'tool-calls-pending' : 'stop', out);
    }

    private violation(reason: string, toolCallId: string, out: AgentEvent[]): void {
        this.closeOpen(out);
        this.fail(LLMError.malformedStream(reason, { toolCallId }), out);
    }

    private fail(error: StepwiseRuntimeError, out: AgentEvent[]): void {
        out.push({ type: 'llm:error', turn: this.turn, error });
        this.seal('error', out, error);
    }

    private seal(reason: TurnEndReason, out: AgentEvent[], error?: StepwiseRuntimeError): void {
        this.reason = reason;
        this.error = error;
        this.state = 'sealed';
        out.push({
            type: 'turn:end',
            turn: this.turn,
            reason,
            ...(error !== undefined && { error }),
        });
    }

    /** Close the open thinking/text block and discard unfinished tool calls */
    private closeOpen(out: AgentEvent[]): void {
        this.closeBlock(out);
        this.discardOpenCalls(out);
    }

    private closeBlock(out: AgentEvent[]): void {
        const block = this.openBlock;
        if (!block) return;
        this.openBlock = null;
        if (block.type === 'thinking') {
            this.blocks.push({
                type: 'thinking',
                text: block.text,
                ...(block.signature !== undefined && { signature: block.signature }),
            });
            out.push({ type: 'llm:thinking-end', turn: this.turn });
        } else {
            this.blocks.push({ type: 'text', text: block.text });
            out.push({ type: 'llm:text-end', turn: this.turn });
        }
    }

    private discardOpenCalls(out: AgentEvent[]): void {
        for (const call of this.openCalls.values()) {
            this.endedCallIds.add(call.id);
            out.push({
                type: 'llm:tool-end',
                turn: this.turn,
                toolCallId: call.id,
                toolName: call.name,
                status: 'discarded',
            });
        }
        this.openCalls.clear();
    }

    private record(out: AgentEvent[]): AgentEvent[] {
        this.events.push(...out);
        return out;
    }
}
