/**
 * Bounded parallel processing tests
 */

import { parallelLimit } from '../src/utils/concurrency.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('parallelLimit', () => {
    test('keeps input order whatever the completion order', async () => {
        const results = await parallelLimit([30, 5, 15], async (ms) => {
            await delay(ms);
            return ms * 2;
        }, 3);
        expect(results).toEqual([60, 10, 30]);
    });

    test('never runs more than the limit at once', async () => {
        let active = 0;
        let peak = 0;
        await parallelLimit([1, 2, 3, 4, 5, 6], async () => {
            active++;
            peak = Math.max(peak, active);
            await delay(5);
            active--;
        }, 2);
        expect(peak).toBe(2);
    });

    test('passes the item index', async () => {
        const results = await parallelLimit(['a', 'b'], async (item, index) => `${index}:${item}`, 1);
        expect(results).toEqual(['0:a', '1:b']);
    });

    test('runs everything, then throws the earliest failure', async () => {
        const seen: number[] = [];
        const run = parallelLimit([0, 1, 2, 3], async (item) => {
            await delay(item === 1 ? 20 : 1);
            seen.push(item);
            if (item % 2 === 1) throw new Error(`failed ${item}`);
            return item;
        }, 4);

        await expect(run).rejects.toThrow('failed 1');
        expect(seen.sort()).toEqual([0, 1, 2, 3]);
    });

    test('a limit below one still makes progress', async () => {
        await expect(parallelLimit([1, 2], async x => x, 0)).resolves.toEqual([1, 2]);
    });

    test('an empty list resolves to an empty list', async () => {
        await expect(parallelLimit([], async x => x, 4)).resolves.toEqual([]);
    });
});
