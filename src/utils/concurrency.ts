/**
 * Run `processor` over `items` with at most `concurrency` tasks in flight.
 *
 * Results keep input order. Every task runs to completion; if any failed,
 * the failure of the earliest item is thrown after all have settled.
 */
export async function parallelLimit<T, R>(
    items: readonly T[],
    processor: (item: T, index: number) => Promise<R>,
    concurrency: number
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const failures = new Map<number, unknown>();
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            try {
                results[index] = await processor(items[index], index);
            } catch (error) {
                failures.set(index, error);
            }
        }
    };

    const workers = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workers }, worker));

    if (failures.size > 0) {
        const firstIndex = Math.min(...failures.keys());
        throw failures.get(firstIndex);
    }
    return results;
}
