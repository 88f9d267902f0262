import type { DB } from '../db';
import type { DocumentStore } from '../types';

/**
 * Whole-document store on the local SQLite database. Each write replaces the
 * document in a single transaction.
 */
export class SqliteDocumentStore implements DocumentStore {
    constructor(private readonly db: DB) { }

    async read(name: string): Promise<string | null> {
        const row = this.db.prepare('SELECT content FROM documents WHERE name = ?').get(name) as { content: string } | undefined;
        return row ? row.content : null;
    }

    async write(name: string, content: string): Promise<void> {
        const upsert = this.db.prepare('INSERT OR REPLACE INTO documents (name, content, updated_at) VALUES (?, ?, ?)');
        this.db.transaction(() => {
            upsert.run(name, content, Date.now());
        })();
    }
}
