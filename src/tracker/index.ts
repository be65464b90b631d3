import type { TrackerBackend } from '../types/index.js';
import { SqliteStageTracker } from './sqlite-stage-tracker.js';
import { FileStageTracker, type StageTracker } from './stage-tracker.js';

export function createStageTracker(backend: TrackerBackend, options: { logsDir: string; trackerDb: string }): StageTracker {
    return backend === 'sqlite' ? new SqliteStageTracker(options.trackerDb) : new FileStageTracker(options.logsDir);
}

export { FileStageTracker, type StageTracker } from './stage-tracker.js';
export { SqliteStageTracker } from './sqlite-stage-tracker.js';
