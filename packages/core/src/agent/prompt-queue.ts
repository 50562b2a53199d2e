/**
 * PromptQueue - FIFO buffer for prompts submitted while a cycle is running.
 *
 * The queue is bounded: once `capacity` prompts wait, `enqueue` throws and the
 * queue is left unchanged. Prompts are never coalesced; each one starts its own cycle.
 */

import { nanoid } from 'nanoid';
import type { AgentEventBus } from '../events/index.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { AgentError } from './errors.js';
import type { QueuedPrompt } from './types.js';

export interface PromptQueueOptions {
    capacity: number;
    logger: Logger;
    eventBus?: AgentEventBus | undefined;
}

export class PromptQueue {
    private queue: QueuedPrompt[] = [];
    private readonly capacity: number;
    private readonly logger: Logger;
    private readonly eventBus: AgentEventBus | undefined;

    constructor(options: PromptQueueOptions) {
        this.capacity = options.capacity;
        this.logger = options.logger.createChild(LogComponent.AGENT);
        this.eventBus = options.eventBus;
    }

    /**
     * Queue a prompt behind the ones already waiting.
     *
     * @throws StepwiseRuntimeError `agent_queue_full` when `capacity` prompts are waiting
     */
    enqueue(content: string): QueuedPrompt {
        if (this.queue.length >= this.capacity) {
            this.logger.warn(`PromptQueue: rejected prompt, ${this.queue.length} already waiting`);
            throw AgentError.queueFull(this.capacity);
        }

        const prompt: QueuedPrompt = { id: nanoid(), content, queuedAt: Date.now() };
        this.queue.push(prompt);

        const position = this.queue.length;
        this.logger.debug(`PromptQueue: enqueued prompt ${prompt.id} at position ${position}`);
        this.eventBus?.emit({ type: 'message:queued', id: prompt.id, position });

        return prompt;
    }

    /**
     * Take the oldest waiting prompt
     */
    dequeue(): QueuedPrompt | undefined {
        const prompt = this.queue.shift();
        if (prompt) {
            this.logger.debug(`PromptQueue: dequeued prompt ${prompt.id}`);
            this.eventBus?.emit({
                type: 'message:dequeued',
                id: prompt.id,
                remaining: this.queue.length,
            });
        }
        return prompt;
    }

    /**
     * Drop every waiting prompt and return them in submission order
     */
    clear(): QueuedPrompt[] {
        const dropped = this.queue;
        this.queue = [];
        if (dropped.length > 0) {
            this.logger.debug(`PromptQueue: cleared ${dropped.length} pending prompt(s)`);
            for (const prompt of dropped) {
                this.eventBus?.emit({ type: 'message:dequeued', id: prompt.id, remaining: 0 });
            }
        }
        return dropped;
    }

    /** Waiting prompts in submission order */
    pending(): readonly QueuedPrompt[] {
        return this.queue.slice();
    }

    get size(): number {
        return this.queue.length;
    }
}
