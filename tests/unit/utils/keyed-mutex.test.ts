import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../../src/utils/keyed-mutex';

describe('KeyedMutex', () => {
    it('should run holders of one key in arrival order', async () => {
        const mutex = new KeyedMutex<number>();
        const order: string[] = [];

        const slow = mutex.runExclusive(1, async () => {
            order.push('first:start');
            await new Promise((resolve) => setTimeout(resolve, 5));
            order.push('first:end');
        });
        const fast = mutex.runExclusive(1, async () => {
            order.push('second');
        });
        await Promise.all([slow, fast]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not make different keys wait for each other', async () => {
        const mutex = new KeyedMutex<number>();
        const release = await mutex.acquire(1);

        await expect(mutex.runExclusive(2, async () => 'done')).resolves.toBe('done');
        expect(mutex.isLocked(1)).toBe(true);
        release();
    });

    it('should release the key when the work throws', async () => {
        const mutex = new KeyedMutex<string>();

        await expect(mutex.runExclusive('a', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(mutex.isLocked('a')).toBe(false);
    });

    it('should ignore a second release', async () => {
        const mutex = new KeyedMutex<string>();
        const release = await mutex.acquire('a');
        release();
        release();

        expect(mutex.isLocked('a')).toBe(false);
    });
});
