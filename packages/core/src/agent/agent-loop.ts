import { nanoid } from 'nanoid';
import type { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { isRuntimeError } from '../errors/runtime-error.js';
import { AgentEventBus, type AgentEvent, type CycleStopReason } from '../events/index.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { createLogger } from '../logger/factory.js';
import { ConversationState } from '../context/conversation-state.js';
import { CharRatioTokenEstimator } from '../context/token-estimator.js';
import type {
    AssistantMessage,
    ConversationMessage,
    MessageDraft,
    TokenEstimator,
    ToolMessage,
} from '../context/types.js';
import { ContextErrorCode } from '../context/error-codes.js';
import { CompactionEngine } from '../context/compaction/engine.js';
import { LLMSummarizer } from '../context/compaction/summarizer.js';
import type { Summarizer } from '../context/compaction/types.js';
import { TurnEngine, type SealedTurn } from '../llm/executor/turn-engine.js';
import { LLMError } from '../llm/errors.js';
import { toTransportError } from '../llm/stream/transport-error.js';
import { addUsage, emptyUsage } from '../llm/types.js';
import type { LLMProvider, LLMStreamRequest, StreamPart, TokenUsage } from '../llm/types.js';
import { ToolDispatcher, type DispatchOutcome } from '../tools/dispatcher.js';
import { ToolRegistry } from '../tools/registry.js';
import type { Tool } from '../tools/types.js';
import { abortPromise, abortReason } from '../utils/abort.js';
import { errorMessage } from '../utils/error-conversion.js';
import { AgentError } from './errors.js';
import { PromptQueue } from './prompt-queue.js';
import { AgentLoopConfigSchema, type AgentLoopConfig, type ValidatedAgentLoopConfig } from './schemas.js';
import type { CycleResult, QueuedPrompt } from './types.js';

export interface AgentLoopOptions {
    provider: LLMProvider;
    /** Capability set offered to the model */
    tools: ToolRegistry | readonly Tool[];
    config?: AgentLoopConfig | undefined;
    /** Defaults to a new bus; exposed as `eventBus` */
    eventBus?: AgentEventBus | undefined;
    /** Defaults to a console logger at level 'error' */
    logger?: Logger | undefined;
    /** Seeded as the leading system message of the conversation */
    systemPrompt?: string | undefined;
    estimator?: TokenEstimator | undefined;
    /** Defaults to an `LLMSummarizer` on `provider` */
    summarizer?: Summarizer | undefined;
    agentId?: string | undefined;
}

interface PendingCycle {
    id: string;
    content: string;
    resolve: (result: CycleResult) => void;
}

interface ActiveCycle {
    promptId: string;
    controller: AbortController;
    turn: number;
    usage: TokenUsage;
}

interface CycleOutcome {
    stopReason: CycleStopReason;
    error?: StepwiseRuntimeError | undefined;
}

type NextPart = { kind: 'part'; result: IteratorResult<StreamPart> } | { kind: 'stall' };

/**
 * Agentic control loop: owns the conversation and the prompt queue, runs one cycle
 * at a time and publishes everything it does on the event bus.
 *
 * A cycle appends the prompt, then repeats compaction, one provider turn and, when
 * the turn requests tools, one dispatch round, until the model stops, an error ends
 * the cycle, or it is cancelled. Tool rounds are committed as a whole (assistant
 * message followed by its results in call order); a cancelled cycle rolls the
 * conversation back to just after its prompt.
 */
export class AgentLoop {
    readonly eventBus: AgentEventBus;
    readonly config: ValidatedAgentLoopConfig;

    private readonly logger: Logger;
    private readonly provider: LLMProvider;
    private readonly registry: ToolRegistry;
    private readonly dispatcher: ToolDispatcher;
    private readonly compaction: CompactionEngine;
    private readonly queue: PromptQueue;
    private readonly state: ConversationState;
    private readonly waiters = new Map<string, (result: CycleResult) => void>();
    private active: ActiveCycle | undefined;
    private running = false;
    private disposed = false;

    constructor(options: AgentLoopOptions) {
        const parsed = AgentLoopConfigSchema.safeParse(options.config ?? {});
        if (!parsed.success) {
            throw AgentError.invalidConfig(parsed.error.issues[0]?.message ?? 'invalid', {
                issues: parsed.error.issues,
            });
        }
        this.config = parsed.data;

        const baseLogger = options.logger ?? createLogger({ agentId: options.agentId ?? 'stepwise' });
        this.logger = baseLogger.createChild(LogComponent.AGENT);
        this.eventBus = options.eventBus ?? new AgentEventBus(this.logger);
        this.provider = options.provider;

        this.registry =
            options.tools instanceof ToolRegistry
                ? options.tools
                : new ToolRegistry(baseLogger, options.tools);
        this.dispatcher = new ToolDispatcher({
            registry: this.registry,
            config: this.config.tools,
            logger: baseLogger,
        });
        this.compaction = new CompactionEngine({
            contextWindow: this.config.contextWindow,
            config: this.config.compaction,
            estimator: options.estimator ?? new CharRatioTokenEstimator(),
            summarizer:
                options.summarizer ??
                new LLMSummarizer(
                    this.provider,
                    { maxSummaryTokens: this.config.compaction.maxSummaryTokens },
                    baseLogger
                ),
            logger: baseLogger,
            eventBus: this.eventBus,
        });
        this.queue = new PromptQueue({
            capacity: this.config.queue.capacity,
            logger: baseLogger,
            eventBus: this.eventBus,
        });
        this.state = new ConversationState(
            options.systemPrompt ? [{ role: 'system', content: options.systemPrompt }] : []
        );
    }

    /**
     * Run a prompt, or queue it behind the running cycle.
     * Resolves when the prompt's own cycle ends; cycle failures are reported in the result.
     *
     * @throws StepwiseRuntimeError `agent_queue_full` synchronously when the queue is at capacity
     * @throws StepwiseRuntimeError `agent_disposed` after `dispose()`
     */
    submit(prompt: string): Promise<CycleResult> {
        if (this.disposed) {
            throw AgentError.disposed();
        }

        if (this.running) {
            const queued = this.queue.enqueue(prompt);
            return new Promise<CycleResult>((resolve) => {
                this.waiters.set(queued.id, resolve);
            });
        }

        this.running = true;
        return new Promise<CycleResult>((resolve) => {
            this.drain({ id: nanoid(), content: prompt, resolve }).catch((error: unknown) => {
                this.logger.error(`Prompt loop stopped unexpectedly: ${errorMessage(error)}`);
            });
        });
    }

    /**
     * Abort the running cycle. Queued prompts stay queued.
     * @returns whether a cycle was running
     */
    cancel(): boolean {
        const cycle = this.active;
        if (!cycle || cycle.controller.signal.aborted) {
            return false;
        }
        this.logger.info(`Cancelling cycle ${cycle.promptId} at turn ${cycle.turn}`);
        cycle.controller.abort(AgentError.cancelled(cycle.promptId));
        return true;
    }

    /**
     * Drop waiting prompts; their `submit` promises resolve as cancelled.
     * @returns number of prompts dropped
     */
    clearQueue(): number {
        const dropped = this.queue.clear();
        for (const prompt of dropped) {
            const resolve = this.waiters.get(prompt.id);
            this.waiters.delete(prompt.id);
            resolve?.({ promptId: prompt.id, stopReason: 'cancelled', turns: 0, usage: emptyUsage() });
        }
        return dropped.length;
    }

    dispose(): void {
        this.disposed = true;
        this.clearQueue();
        this.cancel();
    }

    get isRunning(): boolean {
        return this.running;
    }

    queuedPrompts(): readonly QueuedPrompt[] {
        return this.queue.pending();
    }

    /** Snapshot of the conversation */
    messages(): readonly ConversationMessage[] {
        return this.state.messages();
    }

    private async drain(first: PendingCycle): Promise<void> {
        let next: PendingCycle | undefined = first;
        try {
            while (next) {
                const result = await this.runCycle(next.id, next.content);
                next.resolve(result);
                next = this.takeNext();
            }
        } finally {
            this.running = false;
        }
    }

    private takeNext(): PendingCycle | undefined {
        if (this.disposed) return undefined;
        const prompt = this.queue.dequeue();
        if (!prompt) return undefined;
        const resolve = this.waiters.get(prompt.id);
        this.waiters.delete(prompt.id);
        return {
            id: prompt.id,
            content: prompt.content,
            resolve: resolve ?? (() => undefined),
        };
    }

    private async runCycle(promptId: string, prompt: string): Promise<CycleResult> {
        const controller = new AbortController();
        const signal = controller.signal;

        this.state.append({ role: 'user', content: prompt });
        const checkpoint = this.state.checkpoint();
        const cycle: ActiveCycle = { promptId, controller, turn: 0, usage: emptyUsage() };
        this.active = cycle;

        this.emit({ type: 'agent:start', promptId, prompt });
        this.logger.debug(`Cycle ${promptId} started with ${checkpoint.length} messages`);

        let outcome: CycleOutcome;
        try {
            outcome = await this.runTurns(cycle, signal);
        } catch (error) {
            outcome = signal.aborted ? { stopReason: 'cancelled' } : this.failureOutcome(error);
        } finally {
            this.active = undefined;
        }

        if (outcome.stopReason === 'cancelled') {
            this.state.restore(checkpoint);
            this.emit({ type: 'run:interrupted', promptId, turn: cycle.turn });
        }

        const { stopReason, error } = outcome;
        this.emit({
            type: 'agent:end',
            promptId,
            stopReason,
            turns: cycle.turn,
            usage: cycle.usage,
            ...(error !== undefined && { error: error.toJSON() }),
        });
        this.logger.info(`Cycle ${promptId} ended: ${stopReason} after ${cycle.turn} turn(s)`);

        return {
            promptId,
            stopReason,
            turns: cycle.turn,
            usage: cycle.usage,
            ...(error !== undefined && { error }),
        };
    }

    private async runTurns(cycle: ActiveCycle, signal: AbortSignal): Promise<CycleOutcome> {
        for (;;) {
            if (signal.aborted) {
                return { stopReason: 'cancelled' };
            }
            if (cycle.turn >= this.config.maxTurns) {
                this.logger.warn(`Cycle ${cycle.promptId} reached maxTurns (${this.config.maxTurns})`);
                return { stopReason: 'max-turns' };
            }

            const compaction = await this.compaction.run(this.state, signal);
            if (compaction.kind === 'aborted' || signal.aborted) {
                return { stopReason: 'cancelled' };
            }
            if (compaction.kind === 'halted') {
                this.emit({ type: 'llm:error', error: compaction.error });
                return { stopReason: 'context-overflow', error: compaction.error };
            }

            cycle.turn++;
            const turn = cycle.turn;
            this.emit({ type: 'turn:start', turn });

            const sealed = await this.streamTurn(turn, signal);
            cycle.usage = addUsage(cycle.usage, sealed.usage);

            switch (sealed.reason) {
                case 'cancelled':
                    return { stopReason: 'cancelled' };
                case 'error':
                    return { stopReason: 'error', error: sealed.error };
                case 'stop':
                    this.state.append(this.assistantDraft(sealed));
                    return { stopReason: 'stop' };
                case 'tool-calls-pending': {
                    const outcomes = await this.dispatcher.dispatch(sealed.toolCalls, {
                        signal,
                        onStart: (call) =>
                            this.emit({
                                type: 'llm:tool-running',
                                turn,
                                toolCallId: call.id,
                                toolName: call.name,
                            }),
                        onResult: ({ result }) =>
                            this.emit({
                                type: 'llm:tool-result',
                                turn,
                                toolCallId: result.toolCallId,
                                toolName: result.toolName,
                                result,
                            }),
                    });
                    if (signal.aborted) {
                        return { stopReason: 'cancelled' };
                    }
                    this.state.appendAll([
                        this.assistantDraft(sealed),
                        ...outcomes.map((outcome) => this.toolDraft(outcome)),
                    ]);
                    break;
                }
            }
        }
    }

    /**
     * Drive one provider call through a Turn Engine, racing each part against
     * cancellation and, while tool-call arguments stream, the stall timeout.
     */
    private async streamTurn(turn: number, signal: AbortSignal): Promise<SealedTurn> {
        const engine = new TurnEngine(turn);
        const stallMs = this.config.stream.toolCallIdleTimeoutMs;

        // Closed when the turn ends, so a stalled or finished provider call is torn down
        const turnController = new AbortController();
        const onCycleAbort = () => turnController.abort(abortReason(signal));
        signal.addEventListener('abort', onCycleAbort, { once: true });

        const request: LLMStreamRequest = {
            messages: this.state.messages(),
            tools: this.registry.getDefinitions(),
            onRetry: (info) =>
                this.emit({
                    type: 'llm:retry',
                    attempt: info.attempt,
                    totalAttempts: info.totalAttempts,
                    delayMs: info.delayMs,
                    message: info.error.message,
                }),
        };

        const iterator = this.provider.stream(request, turnController.signal)[Symbol.asyncIterator]();
        const aborted = abortPromise(signal);

        try {
            while (!engine.isSealed()) {
                let next: NextPart;
                try {
                    next = await this.nextPart(
                        iterator,
                        aborted.promise,
                        stallMs > 0 && engine.hasOpenToolCalls() ? stallMs : 0
                    );
                } catch (error) {
                    if (signal.aborted) {
                        this.publish(engine.cancel());
                    } else {
                        this.publish(
                            engine.push({
                                type: 'stream-error',
                                error: toTransportError(this.provider.name, error),
                            })
                        );
                    }
                    break;
                }

                if (signal.aborted) {
                    this.publish(engine.cancel());
                } else if (next.kind === 'stall') {
                    this.logger.warn(`Tool-call stream stalled for ${stallMs}ms in turn ${turn}`);
                    this.publish(engine.stall(stallMs));
                } else if (next.result.done) {
                    this.publish(
                        engine.push({
                            type: 'stream-error',
                            error: LLMError.malformedStream('stream ended without a completion marker'),
                        })
                    );
                } else {
                    this.publish(engine.push(next.result.value));
                }
            }
        } finally {
            aborted.dispose();
            signal.removeEventListener('abort', onCycleAbort);
            turnController.abort();
            this.closeIterator(iterator);
        }

        return engine.result();
    }

    private nextPart(
        iterator: AsyncIterator<StreamPart>,
        aborted: Promise<never>,
        stallMs: number
    ): Promise<NextPart> {
        const part = iterator.next().then((result): NextPart => ({ kind: 'part', result }));
        if (stallMs <= 0) {
            return Promise.race([part, aborted]);
        }

        let timer: ReturnType<typeof setTimeout> | undefined;
        const stall = new Promise<NextPart>((resolve) => {
            timer = setTimeout(() => resolve({ kind: 'stall' }), stallMs);
        });
        return Promise.race([part, aborted, stall]).finally(() => clearTimeout(timer));
    }

    private closeIterator(iterator: AsyncIterator<StreamPart>): void {
        const closing = iterator.return?.();
        if (!closing) return;
        closing.catch((error: unknown) => {
            this.logger.debug(`Provider stream did not close cleanly: ${errorMessage(error)}`);
        });
    }

    private failureOutcome(error: unknown): CycleOutcome {
        if (isRuntimeError(error)) {
            this.logger.error(`Cycle failed: ${error.message}`, { code: error.code });
            return {
                stopReason:
                    error.code === ContextErrorCode.OVERFLOW_UNRECOVERABLE ? 'context-overflow' : 'error',
                error,
            };
        }
        this.logger.error(`Cycle failed: ${errorMessage(error)}`);
        return { stopReason: 'error', error: AgentError.cycleFailed(errorMessage(error), error) };
    }

    private assistantDraft(sealed: SealedTurn): MessageDraft<AssistantMessage> {
        return {
            role: 'assistant',
            content: sealed.content,
            toolCalls: sealed.toolCalls.map((call) => ({
                id: call.id,
                name: call.name,
                // Providers require a JSON object here, even for calls that failed to parse
                arguments:
                    call.argumentsError === undefined && call.rawArguments.trim() !== ''
                        ? call.rawArguments
                        : '{}',
            })),
            ...(sealed.usage !== undefined && { usage: sealed.usage }),
            ...(sealed.finishReason !== undefined && { finishReason: sealed.finishReason }),
        };
    }

    private toolDraft({ result }: DispatchOutcome): MessageDraft<ToolMessage> {
        return {
            role: 'tool',
            toolCallId: result.toolCallId,
            toolName: result.toolName,
            content: result.output,
            isError: !result.success,
        };
    }

    private emit(event: AgentEvent): void {
        this.eventBus.emit(event);
    }

    private publish(events: readonly AgentEvent[]): void {
        for (const event of events) {
            this.emit(event);
        }
    }
}
