import type { z } from 'zod';
import { PERSIST_RETRY } from '../constants';
import { PersistenceError } from '../errors';
import { createLogger } from '../logger';
import type { DocumentStore } from '../types';

const log = createLogger('STORE');

export interface RetryPolicy {
    attempts: number;
    delayMs: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Reads and validates a JSON document. A missing, unparseable or
 * schema-violating document reads as null so callers start from a default.
 */
export async function readJsonDocument<T>(store: DocumentStore, name: string, schema: z.ZodType<T>): Promise<T | null> {
    const raw = await store.read(name);
    if (raw === null || raw.trim() === '') return null;

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e) {
        log(`${name} is not valid JSON, treating as absent: ${e}`);
        return null;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        log(`${name} does not match the expected shape, treating as absent: ${result.error.issues[0]?.message}`);
        return null;
    }
    return result.data;
}

/**
 * Writes a whole document, retrying a fixed number of times with a fixed delay
 * between attempts. Throws PersistenceError once every attempt has failed.
 * An aborted signal stops the loop before the next attempt with the abort reason.
 */
export async function writeWithRetry(
    store: DocumentStore,
    name: string,
    content: string,
    policy: RetryPolicy = PERSIST_RETRY,
    signal?: AbortSignal
): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= policy.attempts; attempt++) {
        signal?.throwIfAborted();
        try {
            await store.write(name, content);
            log(`${name} written (attempt ${attempt})`);
            return;
        } catch (e) {
            lastError = e;
            log(`${name} write failed (attempt ${attempt}/${policy.attempts}): ${e}`);
            if (attempt < policy.attempts) await sleep(policy.delayMs);
        }
    }
    throw new PersistenceError(name, policy.attempts, lastError);
}

export async function writeJsonDocument(store: DocumentStore, name: string, value: unknown, policy?: RetryPolicy, signal?: AbortSignal): Promise<void> {
    await writeWithRetry(store, name, JSON.stringify(value, null, 2), policy, signal);
}
