/**
 * Wait `ms` milliseconds. Resolves early, without rejecting, when the
 * signal aborts; callers check `signal.aborted` afterwards.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => new Promise(resolve => {
    if (signal?.aborted) {
        resolve();
        return;
    }
    const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
});

export type Sleep = typeof sleep;
