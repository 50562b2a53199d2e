import { describe, it, expect } from 'vitest';
import { PromptQueue } from './prompt-queue.js';
import { AgentErrorCode } from './error-codes.js';
import { AgentEventBus } from '../events/index.js';
import { createMockLogger } from '../logger/test-utils.js';
import { recordEvents } from '../test-utils/index.js';

function setup(capacity = 2) {
    const eventBus = new AgentEventBus();
    const recorder = recordEvents(eventBus);
    const queue = new PromptQueue({ capacity, logger: createMockLogger(), eventBus });
    return { queue, recorder };
}

describe('PromptQueue', () => {
    it('should dequeue in submission order', () => {
        const { queue } = setup();

        queue.enqueue('first');
        queue.enqueue('second');

        expect(queue.dequeue()?.content).toBe('first');
        expect(queue.dequeue()?.content).toBe('second');
        expect(queue.dequeue()).toBeUndefined();
    });

    it('should reject prompts past capacity and keep the queue unchanged', () => {
        const { queue } = setup();
        queue.enqueue('first');
        queue.enqueue('second');

        expect(() => queue.enqueue('third')).toThrow('Prompt queue is full (capacity 2)');
        expect(() => queue.enqueue('third')).toThrow(
            expect.objectContaining({ code: AgentErrorCode.QUEUE_FULL })
        );
        expect(queue.pending().map((p) => p.content)).toEqual(['first', 'second']);
    });

    it('should publish queue positions and remaining counts', () => {
        const { queue, recorder } = setup();

        const first = queue.enqueue('first');
        const second = queue.enqueue('second');
        queue.dequeue();

        expect(recorder.events).toEqual([
            { type: 'message:queued', id: first.id, position: 1 },
            { type: 'message:queued', id: second.id, position: 2 },
            { type: 'message:dequeued', id: first.id, remaining: 1 },
        ]);
    });

    it('should return cleared prompts in order', () => {
        const { queue, recorder } = setup(3);
        queue.enqueue('a');
        queue.enqueue('b');

        const dropped = queue.clear();

        expect(dropped.map((p) => p.content)).toEqual(['a', 'b']);
        expect(queue.size).toBe(0);
        expect(recorder.types().slice(-2)).toEqual(['message:dequeued', 'message:dequeued']);
        expect(queue.clear()).toEqual([]);
    });
});
