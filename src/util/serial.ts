/**
 * Run async tasks one at a time, in call order. A failed task does not
 * block the ones queued behind it.
 */
export type Serial = <T>(task: () => Promise<T>) => Promise<T>;

export const createSerial = (): Serial => {
    let tail: Promise<unknown> = Promise.resolve();
    return <T>(task: () => Promise<T>): Promise<T> => {
        const run = tail.then(task);
        tail = run.catch(() => undefined);
        return run;
    };
};
