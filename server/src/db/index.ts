import Database from 'better-sqlite3';
import { createLogger } from '../logger';

const log = createLogger('DB');

export type DB = Database.Database;

export const openDatabase = (dbPath: string): DB => {
    const db = new Database(dbPath);
    // WAL keeps readers (API routes) off the writer's back during a job
    if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
    initDB(db);
    return db;
};

export const initDB = (db: DB) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS documents (
            name TEXT PRIMARY KEY,
            content TEXT NOT NULL,
            updated_at INTEGER NOT NULL
        );
    `);
    log('Initialized SQLite database');
};
