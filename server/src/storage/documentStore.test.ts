import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { readJsonDocument, writeJsonDocument, writeWithRetry } from './documentStore';
import { PersistenceError } from '../errors';
import { MemoryStore } from '../test/helpers';

const CounterSchema = z.object({ count: z.number() });

describe('readJsonDocument', () => {
    it('parses a valid document', async () => {
        const store = new MemoryStore();
        store.docs.set('counter.json', '{"count": 3}');
        expect(await readJsonDocument(store, 'counter.json', CounterSchema)).toEqual({ count: 3 });
    });

    it.each([
        ['missing', undefined],
        ['blank', '   '],
        ['truncated', '{"count": '],
        ['wrong shape', '{"count": "three"}']
    ])('reads a %s document as null', async (_, content) => {
        const store = new MemoryStore();
        if (content !== undefined) store.docs.set('counter.json', content);
        expect(await readJsonDocument(store, 'counter.json', CounterSchema)).toBeNull();
    });
});

describe('writeWithRetry', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('writes once when the store accepts', async () => {
        const store = new MemoryStore();
        await writeWithRetry(store, 'a.json', 'x');
        expect(store.writes).toHaveLength(1);
        expect(store.docs.get('a.json')).toBe('x');
    });

    it('waits the fixed delay between attempts and succeeds on the third', async () => {
        vi.useFakeTimers();
        const store = new MemoryStore();
        store.failWrites = 2;

        const done = writeWithRetry(store, 'a.json', 'x', { attempts: 3, delayMs: 5000 });

        await vi.advanceTimersByTimeAsync(4999);
        expect(store.writes).toHaveLength(1);
        await vi.advanceTimersByTimeAsync(1);
        expect(store.writes).toHaveLength(2);
        await vi.advanceTimersByTimeAsync(4999);
        expect(store.writes).toHaveLength(2);
        await vi.advanceTimersByTimeAsync(1);

        await done;
        expect(store.writes).toHaveLength(3);
        expect(store.docs.get('a.json')).toBe('x');
    });

    it('gives up after the last attempt without a trailing wait', async () => {
        vi.useFakeTimers();
        const store = new MemoryStore();
        store.failWrites = 5;

        const done = writeWithRetry(store, 'a.json', 'x', { attempts: 3, delayMs: 5000 });
        const failed = expect(done).rejects.toMatchObject({ name: 'PersistenceError', document: 'a.json', attempts: 3 });

        await vi.advanceTimersByTimeAsync(10000);
        await failed;
        expect(store.writes).toHaveLength(3);
        expect(vi.getTimerCount()).toBe(0);
    });
});

describe('writeWithRetry cancellation', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('makes no further attempt after the signal is aborted', async () => {
        vi.useFakeTimers();
        const store = new MemoryStore();
        store.failWrites = 5;
        const controller = new AbortController();

        const done = writeWithRetry(store, 'a.json', 'x', { attempts: 3, delayMs: 5000 }, controller.signal);
        const failed = expect(done).rejects.toThrow('run abandoned');

        await vi.advanceTimersByTimeAsync(0);
        expect(store.writes).toHaveLength(1);
        controller.abort(new Error('run abandoned'));
        await vi.advanceTimersByTimeAsync(5000);

        await failed;
        expect(store.writes).toHaveLength(1);
    });

    it('does not write at all with an already aborted signal', async () => {
        const store = new MemoryStore();
        await expect(writeWithRetry(store, 'a.json', 'x', undefined, AbortSignal.abort(new Error('run abandoned')))).rejects.toThrow('run abandoned');
        expect(store.writes).toHaveLength(0);
    });
});

describe('writeJsonDocument', () => {
    it('stores pretty-printed JSON', async () => {
        const store = new MemoryStore();
        await writeJsonDocument(store, 'counter.json', { count: 1 });
        expect(store.docs.get('counter.json')).toBe('{\n  "count": 1\n}');
    });

    it('surfaces the last failure reason', async () => {
        const store = new MemoryStore();
        store.failWrites = 1;

        const done = writeJsonDocument(store, 'counter.json', { count: 1 }, { attempts: 1, delayMs: 0 });
        await expect(done).rejects.toBeInstanceOf(PersistenceError);
        await expect(done).rejects.toMatchObject({ reason: expect.objectContaining({ message: 'store offline' }) });
        expect(store.docs.has('counter.json')).toBe(false);
    });
});
