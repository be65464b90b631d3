import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { STAGE_NAMES, type StageName } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { StageTracker } from './stage-tracker.js';

const MIGRATION_V1 = `
-- Stages: one row per completed stage
CREATE TABLE IF NOT EXISTS stages (
  name TEXT PRIMARY KEY,
  completed_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

/**
 * Stage flags kept in a SQLite table, for setups where the logs directory
 * is not shared between runs.
 */
export class SqliteStageTracker implements StageTracker {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.migrate();

        getLogger().debug({ dbPath }, 'Stage database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Stage database migrated to v1');
        }
    }

    isComplete(stage: StageName): boolean {
        return this.db.prepare('SELECT 1 FROM stages WHERE name = ?').pluck().get(stage) !== undefined;
    }

    markComplete(stage: StageName): void {
        this.db
            .prepare(`INSERT INTO stages (name) VALUES (?) ON CONFLICT(name) DO UPDATE SET completed_at = datetime('now')`)
            .run(stage);
    }

    reset(stage: StageName): void {
        this.db.prepare('DELETE FROM stages WHERE name = ?').run(stage);
    }

    completedStages(): StageName[] {
        const names = new Set(this.db.prepare('SELECT name FROM stages').pluck().all());
        return STAGE_NAMES.filter((stage) => names.has(stage));
    }

    close(): void {
        this.db.close();
        getLogger().debug('Stage database closed');
    }
}
