import type { MessageDraft } from '../types.js';
import type { MessageRange } from './types.js';

/**
 * Find the oldest contiguous run of messages that may be summarized.
 *
 * A turn is one model round: an assistant message followed by the results of its
 * tool calls. The run starts after a leading system message and ends right before
 * the assistant message that opens the last `preserveLastNTurns` turns, so a tool
 * call and its results always land on the same side of the cut. Earlier summaries
 * are not turns, and a run made of a single earlier summary is not compactable.
 *
 * @returns The range, or null when nothing can be compacted
 */
export function findCompactableRange(
    messages: readonly MessageDraft[],
    preserveLastNTurns: number
): MessageRange | null {
    const start = messages[0]?.role === 'system' ? 1 : 0;

    let end = messages.length;
    if (preserveLastNTurns > 0) {
        let turnsFound = 0;
        for (let i = messages.length - 1; i >= start && turnsFound < preserveLastNTurns; i--) {
            const message = messages[i];
            if (message?.role === 'assistant' && !isSummary(message)) {
                end = i;
                turnsFound++;
            }
        }
        // Fewer turns than requested means the whole history is preserved
        if (turnsFound < preserveLastNTurns) return null;
    }

    if (end <= start) return null;

    if (end - start === 1 && isSummary(messages[start])) {
        return null;
    }

    return { start, end };
}

export function isSummary(message: MessageDraft | undefined): boolean {
    return message?.role === 'assistant' && message.metadata?.isSummary === true;
}
