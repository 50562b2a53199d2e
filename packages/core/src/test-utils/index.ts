/**
 * Helpers for tests of packages built on the core
 */

import type { AgentEvent, AgentEventBus } from '../events/index.js';
import type { StreamPart } from '../llm/types.js';

export { createMockLogger, createSilentMockLogger } from '../logger/test-utils.js';

/**
 * Async iterable over fixed parts, for feeding adapters and engines
 */
export async function* streamOf<T = StreamPart>(items: readonly T[]): AsyncGenerator<T> {
    for (const item of items) {
        yield item;
    }
}

/**
 * Record every event published on the bus, in order
 */
export function recordEvents(bus: AgentEventBus): { events: AgentEvent[]; types: () => string[] } {
    const events: AgentEvent[] = [];
    bus.onEvent((event) => events.push(event));
    return { events, types: () => events.map((event) => event.type) };
}
