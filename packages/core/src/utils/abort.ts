/**
 * Cancellation helpers shared by the stream drivers, the dispatcher and providers.
 */

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 * Uses the global timer so fake timers in tests control it.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(abortReason(signal));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * The reason a signal aborted, always as an Error
 */
export function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason;
    if (reason instanceof Error) return reason;
    const error = new Error(typeof reason === 'string' ? reason : 'Operation aborted');
    error.name = 'AbortError';
    return error;
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

/**
 * A promise that settles (never resolves) when the signal aborts, plus a disposer
 * that detaches the listener once the race it takes part in is over.
 */
export function abortPromise(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
    let onAbort: (() => void) | undefined;
    const promise = new Promise<never>((_, reject) => {
        if (signal.aborted) {
            reject(abortReason(signal));
            return;
        }
        onAbort = () => reject(abortReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });
    });
    // The rejection is observed through the race; this keeps an unraced abort quiet
    promise.catch(() => undefined);
    return {
        promise,
        dispose: () => {
            if (onAbort) signal.removeEventListener('abort', onAbort);
        },
    };
}
