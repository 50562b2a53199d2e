import { nanoid } from 'nanoid';
import type {
    ConversationCheckpoint,
    ConversationMessage,
    MessageDraft,
} from './types.js';
import { ContextError } from './errors.js';

function materialize(draft: MessageDraft): ConversationMessage {
    const message: ConversationMessage = { ...draft, id: nanoid(), timestamp: Date.now() };
    return Object.freeze(message);
}

/**
 * Ordered arena of immutable message records forming the provider-call context.
 *
 * The history only grows through `append`/`appendAll`. The two exceptions are
 * `replaceRange`, a single atomic splice used by compaction, and `restore`, which
 * rolls back to a checkpoint after a cancelled cycle. A leading system message is
 * never replaced.
 */
export class ConversationState {
    private records: ConversationMessage[] = [];

    constructor(initial: readonly MessageDraft[] = []) {
        this.records = initial.map(materialize);
    }

    get length(): number {
        return this.records.length;
    }

    messages(): readonly ConversationMessage[] {
        return this.records.slice();
    }

    append(draft: MessageDraft): ConversationMessage {
        const message = materialize(draft);
        this.records.push(message);
        return message;
    }

    /**
     * Append several messages at once (assistant message plus its tool results)
     */
    appendAll(drafts: readonly MessageDraft[]): ConversationMessage[] {
        const messages = drafts.map(materialize);
        this.records.push(...messages);
        return messages;
    }

    /**
     * Replace messages in `[start, end)` with `replacement` in one splice.
     * An empty range inserts; an empty replacement deletes.
     */
    replaceRange(start: number, end: number, replacement: readonly MessageDraft[]): ConversationMessage[] {
        const length = this.records.length;
        if (
            !Number.isInteger(start) ||
            !Number.isInteger(end) ||
            start < 0 ||
            end < start ||
            end > length
        ) {
            throw ContextError.invalidRange(start, end, length);
        }
        if (start === 0 && this.records[0]?.role === 'system') {
            throw ContextError.systemMessageProtected();
        }

        const messages = replacement.map(materialize);
        this.records = [...this.records.slice(0, start), ...messages, ...this.records.slice(end)];
        return messages;
    }

    checkpoint(): ConversationCheckpoint {
        return Object.freeze({ length: this.records.length, messages: this.records.slice() });
    }

    restore(checkpoint: ConversationCheckpoint): void {
        this.records = checkpoint.messages.slice();
    }

    /**
     * Most recent user message text, if any
     */
    lastUserContent(): string | undefined {
        for (let i = this.records.length - 1; i >= 0; i--) {
            const message = this.records[i];
            if (message?.role === 'user') return message.content;
        }
        return undefined;
    }
}
