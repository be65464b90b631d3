import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { STAGE_NAMES, type StageName } from '../types/index.js';

/**
 * Durable per-stage completion flags.
 *
 * A stage is marked complete only after all of its output is written.
 * Resetting a flag is the operator's way to force a stage to run again.
 */
export interface StageTracker {
    isComplete(stage: StageName): boolean;
    markComplete(stage: StageName): void;
    reset(stage: StageName): void;
    /** Completed stages, in pipeline order */
    completedStages(): StageName[];
    close(): void;
}

/**
 * Zero-byte `<stage>.flag` files in the logs directory.
 */
export class FileStageTracker implements StageTracker {
    constructor(private readonly logsDir: string) {}

    flagPath(stage: StageName): string {
        return join(this.logsDir, `${stage}.flag`);
    }

    isComplete(stage: StageName): boolean {
        return existsSync(this.flagPath(stage));
    }

    markComplete(stage: StageName): void {
        mkdirSync(this.logsDir, { recursive: true });
        writeFileSync(this.flagPath(stage), '');
    }

    reset(stage: StageName): void {
        rmSync(this.flagPath(stage), { force: true });
    }

    completedStages(): StageName[] {
        return STAGE_NAMES.filter((stage) => this.isComplete(stage));
    }

    close(): void {
        // nothing held open
    }
}
