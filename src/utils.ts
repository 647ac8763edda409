/**
 * Shared helpers.
 */

/**
 * Executes async functions concurrently with a limit.
 *
 * Uses a worker pool that starts the next item as soon as one completes.
 * Results keep the order of `items`; the first rejection rejects the whole
 * run.
 *
 * @param items - Items to process
 * @param concurrency - Maximum number of concurrent executions
 * @param fn - Async function to execute for each item
 * @returns Results in the same order as the input
 *
 * @example
 * ```ts
 * const digests = await runConcurrent(files, 8, (file) => hashFile(file));
 * ```
 */
export async function runConcurrent<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    if (items.length === 0) {
        return [];
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
        while (nextIndex < items.length) {
            const index = nextIndex++;
            results[index] = await fn(items[index], index);
        }
    }

    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
}

/**
 * Whether an error is a file system "no such file or directory".
 */
export function isNotFoundError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
