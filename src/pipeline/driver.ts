import type { StageName } from '../types/index.js';
import type { StageTracker } from '../tracker/index.js';
import { StageOutputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type StageStats = Record<string, number>;

/**
 * One pipeline stage.
 *
 * `precondition` validates inputs before any work; `postcondition` returns
 * the declared outputs that are missing after the action ran.
 */
export interface StageDescriptor {
    name: StageName;
    precondition?: () => void;
    action: () => Promise<StageStats>;
    postcondition?: () => string[];
}

export interface StageResult {
    name: StageName;
    status: 'completed' | 'skipped';
    durationMs: number;
    stats: StageStats;
}

export interface PipelineReport {
    stages: StageResult[];
}

export interface RunPipelineOptions {
    /** Run only these stages; all when omitted */
    only?: readonly StageName[];
}

/**
 * Run stages in order, gated by the tracker.
 *
 * A stage already marked complete is skipped. A stage is marked complete
 * only after its postcondition holds; any error propagates and leaves the
 * flags of earlier stages in place.
 */
export async function runPipeline(
    stages: readonly StageDescriptor[],
    tracker: StageTracker,
    options: RunPipelineOptions = {}
): Promise<PipelineReport> {
    const logger = getLogger();
    const report: PipelineReport = { stages: [] };

    for (const stage of stages) {
        if (options.only && !options.only.includes(stage.name)) continue;

        if (tracker.isComplete(stage.name)) {
            logger.info({ stage: stage.name }, 'Stage already done, skipping');
            report.stages.push({ name: stage.name, status: 'skipped', durationMs: 0, stats: {} });
            continue;
        }

        logger.info({ stage: stage.name }, 'Stage started');
        const startTime = Date.now();

        stage.precondition?.();
        const stats = await stage.action();

        const missing = stage.postcondition?.() ?? [];
        if (missing.length > 0) {
            throw new StageOutputError(stage.name, missing);
        }

        tracker.markComplete(stage.name);
        const durationMs = Date.now() - startTime;
        logger.info({ stage: stage.name, durationMs, ...stats }, 'Stage finished');
        report.stages.push({ name: stage.name, status: 'completed', durationMs, stats });
    }

    return report;
}
