export interface BatchRunResult {
    completed: number;
    failed: number;
    durationMs: number;
}

/**
 * Drains `items` with a fixed number of workers. Each worker pulls the next
 * unclaimed item as soon as it finishes the previous one, so one slow item
 * never holds up the rest of a chunk.
 *
 * A worker that rejects counts as failed; the error is handed to `onError`
 * and the worker moves on.
 */
export async function runWithConcurrency<T>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<void>,
    onError?: (err: unknown, item: T) => void
): Promise<BatchRunResult> {
    const startedAt = Date.now();
    const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
    let next = 0;
    let completed = 0;
    let failed = 0;

    const drain = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            const item = items[index];
            try {
                await worker(item, index);
                completed++;
            } catch (err) {
                failed++;
                onError?.(err, item);
            }
        }
    };

    if (items.length > 0) {
        await Promise.all(Array.from({ length: workerCount }, () => drain()));
    }

    return {
        completed,
        failed,
        durationMs: Date.now() - startedAt,
    };
}
