import { z } from 'zod';
import type { DocumentStore } from '../types';

const GIST_API = 'https://api.github.com/gists';

const GistFileSchema = z.object({
    content: z.string().optional(),
    truncated: z.boolean().optional(),
    raw_url: z.string().optional()
});

const GistResponseSchema = z.object({
    files: z.record(GistFileSchema.nullable())
});

type FetchFn = typeof fetch;

/**
 * Documents kept as files of a single GitHub gist. Every write is one PATCH,
 * so a document is replaced whole or not at all.
 */
export class GistDocumentStore implements DocumentStore {
    constructor(
        private readonly gistId: string,
        private readonly token: string,
        private readonly fetchImpl: FetchFn = fetch
    ) { }

    private headers(): Record<string, string> {
        return {
            Authorization: `token ${this.token}`,
            Accept: 'application/vnd.github+json'
        };
    }

    async read(name: string): Promise<string | null> {
        const res = await this.fetchImpl(`${GIST_API}/${this.gistId}`, { headers: this.headers() });
        if (!res.ok) throw new Error(`Gist HTTP ${res.status}`);

        const gist = GistResponseSchema.parse(await res.json());
        const file = gist.files[name];
        if (!file) return null;

        // Large files are cut off in the API response; the raw URL has the full text
        if (file.truncated && file.raw_url) {
            const raw = await this.fetchImpl(file.raw_url, { headers: this.headers() });
            if (!raw.ok) throw new Error(`Gist raw HTTP ${raw.status}`);
            return raw.text();
        }
        return file.content ?? null;
    }

    async write(name: string, content: string): Promise<void> {
        const res = await this.fetchImpl(`${GIST_API}/${this.gistId}`, {
            method: 'PATCH',
            headers: { ...this.headers(), 'Content-Type': 'application/json' },
            body: JSON.stringify({ files: { [name]: { content } } })
        });
        if (res.status !== 200) {
            const text = await res.text();
            throw new Error(`Gist update failed: ${res.status} ${text.slice(0, 200)}`);
        }
    }
}
