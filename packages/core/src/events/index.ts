import type { StepwiseRuntimeError, SerializedRuntimeError } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import type { TokenUsage } from '../llm/types.js';
import type { ToolResult } from '../tools/types.js';

/**
 * Completion reason of a single turn
 */
export type TurnEndReason = 'stop' | 'tool-calls-pending' | 'error' | 'cancelled';

/**
 * Why a whole prompt cycle ended
 */
export type CycleStopReason = 'stop' | 'error' | 'cancelled' | 'max-turns' | 'context-overflow';

/**
 * Event payloads keyed by event name.
 * Every event on the bus is `{ type: name, ...payload }`.
 */
export interface AgentEventMap {
    // Lifecycle
    /** A prompt cycle began */
    'agent:start': {
        promptId: string;
        prompt: string;
    };

    /** A prompt cycle ended */
    'agent:end': {
        promptId: string;
        stopReason: CycleStopReason;
        turns: number;
        usage: TokenUsage;
        error?: SerializedRuntimeError | undefined;
    };

    /** A provider call is about to start */
    'turn:start': {
        turn: number;
    };

    /** Terminal event of every turn */
    'turn:end': {
        turn: number;
        reason: TurnEndReason;
        error?: StepwiseRuntimeError | undefined;
    };

    // Thinking blocks
    'llm:thinking-start': { turn: number };
    'llm:thinking-delta': { turn: number; delta: string };
    'llm:thinking-end': { turn: number };

    // Text blocks
    'llm:text-start': { turn: number };
    'llm:text-delta': { turn: number; delta: string };
    'llm:text-end': { turn: number };

    // Tool-call blocks
    'llm:tool-start': {
        turn: number;
        toolCallId: string;
        toolName: string;
    };

    'llm:tool-args-delta': {
        turn: number;
        toolCallId: string;
        delta: string;
    };

    /** Estimated size of the arguments streamed so far for one call */
    'llm:tool-args-tokens': {
        turn: number;
        toolCallId: string;
        tokens: number;
    };

    /** `discarded` means the call never completed and will not be dispatched */
    'llm:tool-end': {
        turn: number;
        toolCallId: string;
        toolName: string;
        status: 'complete' | 'discarded';
    };

    /** A dispatched call passed validation and its tool began executing */
    'llm:tool-running': {
        turn: number;
        toolCallId: string;
        toolName: string;
    };

    /** Fired as each dispatched call settles (completion order) */
    'llm:tool-result': {
        turn: number;
        toolCallId: string;
        toolName: string;
        result: ToolResult;
    };

    // Diagnostics
    /** Provider connection is being retried */
    'llm:retry': {
        attempt: number;
        totalAttempts: number;
        delayMs: number;
        message: string;
    };

    'llm:error': {
        turn?: number | undefined;
        error: StepwiseRuntimeError;
    };

    'llm:warning': {
        turn?: number | undefined;
        message: string;
    };

    /** The in-flight cycle was cancelled */
    'run:interrupted': {
        promptId: string;
        turn: number;
    };

    // Compaction
    'context:compaction-start': {
        tokensBefore: number;
        budget: number;
    };

    'context:compaction-end': {
        tokensBefore: number;
        tokensAfter: number;
        summarizedMessages: number;
        aborted: boolean;
    };

    // Prompt queue
    'message:queued': {
        id: string;
        position: number;
    };

    'message:dequeued': {
        id: string;
        remaining: number;
    };
}

export type AgentEventName = keyof AgentEventMap;

/**
 * Type helper to extract events by name from AgentEventMap
 */
export type AgentEventByName<K extends AgentEventName> = { type: K } & AgentEventMap[K];

/**
 * Union of every event on the bus
 */
export type AgentEvent = { [K in AgentEventName]: AgentEventByName<K> }[AgentEventName];

export type AgentEventHandler = (event: AgentEvent) => void;

export const AGENT_EVENT_NAMES = [
    'agent:start',
    'agent:end',
    'turn:start',
    'turn:end',
    'llm:thinking-start',
    'llm:thinking-delta',
    'llm:thinking-end',
    'llm:text-start',
    'llm:text-delta',
    'llm:text-end',
    'llm:tool-start',
    'llm:tool-args-delta',
    'llm:tool-args-tokens',
    'llm:tool-end',
    'llm:tool-running',
    'llm:tool-result',
    'llm:retry',
    'llm:error',
    'llm:warning',
    'run:interrupted',
    'context:compaction-start',
    'context:compaction-end',
    'message:queued',
    'message:dequeued',
] as const satisfies readonly AgentEventName[];

/**
 * Stream events derived from provider output within one turn
 */
export const STREAM_EVENT_NAMES = [
    'llm:thinking-start',
    'llm:thinking-delta',
    'llm:thinking-end',
    'llm:text-start',
    'llm:text-delta',
    'llm:text-end',
    'llm:tool-start',
    'llm:tool-args-delta',
    'llm:tool-args-tokens',
    'llm:tool-end',
    'llm:tool-running',
    'llm:tool-result',
] as const satisfies readonly AgentEventName[];

export function isEventOf<K extends AgentEventName>(
    event: { type: string },
    type: K
): event is AgentEventByName<K> {
    return event.type === type;
}

interface Subscription {
    /** Event name, or '*' for every event */
    type: AgentEventName | '*';
    handler: AgentEventHandler;
    /** Listener as registered by the caller, used by `off` */
    listener: unknown;
    once: boolean;
}

export interface SubscribeOptions {
    /** Removes the subscription when aborted */
    signal?: AbortSignal | undefined;
}

/**
 * Publish/subscribe bus with one explicit, ordered subscription list.
 *
 * Handlers run synchronously in registration order. A handler that throws is
 * logged and does not prevent delivery to the handlers after it.
 */
export class AgentEventBus {
    private subscriptions: Subscription[] = [];

    constructor(private readonly logger?: Logger) {}

    emit(event: AgentEvent): void {
        // Snapshot so handlers may subscribe or unsubscribe during delivery
        for (const subscription of [...this.subscriptions]) {
            if (subscription.type !== '*' && subscription.type !== event.type) continue;
            if (subscription.once) this.remove(subscription);
            try {
                subscription.handler(event);
            } catch (error) {
                this.reportHandlerError(event.type, error);
            }
        }
    }

    /**
     * Subscribe to every event
     * @returns Unsubscribe function
     */
    onEvent(handler: AgentEventHandler, options?: SubscribeOptions): () => void {
        return this.add({ type: '*', handler, listener: handler, once: false }, options);
    }

    on<K extends AgentEventName>(
        type: K,
        listener: (event: AgentEventByName<K>) => void,
        options?: SubscribeOptions
    ): () => void {
        return this.add(
            { type, handler: this.narrow(type, listener), listener, once: false },
            options
        );
    }

    once<K extends AgentEventName>(
        type: K,
        listener: (event: AgentEventByName<K>) => void,
        options?: SubscribeOptions
    ): () => void {
        return this.add(
            { type, handler: this.narrow(type, listener), listener, once: true },
            options
        );
    }

    /**
     * Remove a listener registered with `on`/`once`, or a handler registered with `onEvent` ('*')
     */
    off<K extends AgentEventName>(type: K | '*', listener: unknown): void {
        const subscription = this.subscriptions.find(
            (s) => s.type === type && s.listener === listener
        );
        if (subscription) this.remove(subscription);
    }

    listenerCount(type?: AgentEventName | '*'): number {
        if (type === undefined) return this.subscriptions.length;
        return this.subscriptions.filter((s) => s.type === type).length;
    }

    removeAllListeners(): void {
        this.subscriptions = [];
    }

    private narrow<K extends AgentEventName>(
        type: K,
        listener: (event: AgentEventByName<K>) => void
    ): AgentEventHandler {
        return (event: { type: string }) => {
            if (isEventOf(event, type)) listener(event);
        };
    }

    private add(subscription: Subscription, options?: SubscribeOptions): () => void {
        const signal = options?.signal;
        // If signal is already aborted, don't add the listener
        if (signal?.aborted) return () => {};

        this.subscriptions.push(subscription);

        if (!signal) {
            return () => this.remove(subscription);
        }

        const onAbort = () => this.remove(subscription);
        signal.addEventListener('abort', onAbort, { once: true });
        return () => {
            signal.removeEventListener('abort', onAbort);
            this.remove(subscription);
        };
    }

    private remove(subscription: Subscription): void {
        const index = this.subscriptions.indexOf(subscription);
        if (index !== -1) this.subscriptions.splice(index, 1);
    }

    private reportHandlerError(type: AgentEventName, error: unknown): void {
        const message = error instanceof Error ? error.message : String(error);
        if (this.logger) {
            this.logger.error(`Event handler for '${type}' threw: ${message}`, { event: type });
        } else {
            console.error(`Event handler for '${type}' threw:`, error);
        }
    }
}
