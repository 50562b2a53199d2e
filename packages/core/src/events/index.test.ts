import { describe, it, expect, vi } from 'vitest';
import {
    AGENT_EVENT_NAMES,
    AgentEventBus,
    STREAM_EVENT_NAMES,
    type AgentEvent,
} from './index.js';
import { createMockLogger } from '../logger/test-utils.js';

const turnStart = (turn: number): AgentEvent => ({ type: 'turn:start', turn });

describe('AgentEventBus', () => {
    it('should deliver events to handlers in registration order', () => {
        const bus = new AgentEventBus();
        const seen: string[] = [];

        bus.onEvent((event) => seen.push(`all:${event.type}`));
        bus.on('turn:start', (event) => seen.push(`turn:${event.turn}`));
        bus.emit(turnStart(1));
        bus.emit({ type: 'llm:text-delta', turn: 1, delta: 'hi' });

        expect(seen).toEqual(['all:turn:start', 'turn:1', 'all:llm:text-delta']);
    });

    it('should deliver once listeners a single time', () => {
        const bus = new AgentEventBus();
        const listener = vi.fn();

        bus.once('turn:start', listener);
        bus.emit(turnStart(1));
        bus.emit(turnStart(2));

        expect(listener).toHaveBeenCalledTimes(1);
        expect(bus.listenerCount('turn:start')).toBe(0);
    });

    it('should remove listeners with off and the returned function', () => {
        const bus = new AgentEventBus();
        const first = vi.fn();
        const second = vi.fn();

        bus.on('turn:start', first);
        const unsubscribe = bus.onEvent(second);
        bus.off('turn:start', first);
        unsubscribe();
        bus.emit(turnStart(1));

        expect(first).not.toHaveBeenCalled();
        expect(second).not.toHaveBeenCalled();
        expect(bus.listenerCount()).toBe(0);
    });

    it('should remove a listener when its signal aborts', () => {
        const bus = new AgentEventBus();
        const controller = new AbortController();
        const listener = vi.fn();

        bus.on('turn:start', listener, { signal: controller.signal });
        controller.abort();
        bus.emit(turnStart(1));
        bus.on('turn:start', listener, { signal: controller.signal });

        expect(listener).not.toHaveBeenCalled();
        expect(bus.listenerCount('turn:start')).toBe(0);
    });

    it('should log a throwing handler and keep delivering', () => {
        const logger = createMockLogger();
        const bus = new AgentEventBus(logger);
        const after = vi.fn();

        bus.on('turn:start', () => {
            throw new Error('handler failed');
        });
        bus.on('turn:start', after);
        bus.emit(turnStart(3));

        expect(after).toHaveBeenCalledWith({ type: 'turn:start', turn: 3 });
        expect(logger.error).toHaveBeenCalledWith(
            "Event handler for 'turn:start' threw: handler failed",
            { event: 'turn:start' }
        );
    });

    it('should not deliver the current event to handlers added during delivery', () => {
        const bus = new AgentEventBus();
        const late = vi.fn();

        bus.on('turn:start', () => {
            bus.on('turn:start', late);
        });
        bus.emit(turnStart(1));

        expect(late).not.toHaveBeenCalled();
    });
});

describe('event names', () => {
    it('should list each event once', () => {
        expect(new Set(AGENT_EVENT_NAMES).size).toBe(AGENT_EVENT_NAMES.length);
    });

    it('should list every stream event among the agent events', () => {
        for (const name of STREAM_EVENT_NAMES) {
            expect(AGENT_EVENT_NAMES).toContain(name);
        }
        expect(STREAM_EVENT_NAMES).not.toContain('turn:start');
    });
});
