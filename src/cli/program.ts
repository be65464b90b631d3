import { Command, InvalidArgumentError } from 'commander';
import {
    STAGE_NAMES,
    SYNTHETIC_KINDS,
    type EtlConfig,
    type EtlConfigInput,
    type LogLevel,
    type MalformedRecordPolicy,
    type StageName,
    type SyntheticKind,
    type TrackerBackend,
} from '../types/index.js';
import { runPipeline, type PipelineReport } from '../pipeline/driver.js';
import { buildStages, createDefaultSource, type PipelineDeps } from '../pipeline/stages.js';
import { planDownload } from '../fetcher/fetcher.js';
import { createStageTracker } from '../tracker/index.js';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Option parsers ───────────────────────────────────────

export function parseInteger(min: number): (value: string) => number {
    return (value) => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min) {
            throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
        }
        return parsed;
    };
}

export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
    return (value) => {
        const choice = choices.find((c) => c === value);
        if (choice === undefined) {
            throw new InvalidArgumentError(`Expected one of: ${choices.join(', ')}.`);
        }
        return choice;
    };
}

function collectChoice<T extends string>(choices: readonly T[]): (value: string, previous: T[] | undefined) => T[] {
    const parse = parseChoice(choices);
    return (value, previous) => [...(previous ?? []), parse(value)];
}

// ─── Shared options ───────────────────────────────────────

interface CommonOptions {
    rawDir?: string;
    importDir?: string;
    logsDir?: string;
    tracker?: TrackerBackend;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface DownloadOptions {
    minCitations?: number;
    year?: string;
    limit?: number;
    batchSize?: number;
    maxRetries?: number;
    fields?: string[];
    affiliations?: boolean;
    dryRun?: boolean;
}

interface PrepareOptions {
    prepareBatchSize?: number;
    malformed?: MalformedRecordPolicy;
}

interface GenerateOptions {
    seed?: number;
}

interface RunOptions extends CommonOptions, DownloadOptions, PrepareOptions, GenerateOptions {
    kinds?: SyntheticKind[];
    load?: boolean;
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--raw-dir <dir>', 'Directory for raw JSON-lines batches')
        .option('--import-dir <dir>', 'Directory for CSV tables')
        .option('--logs-dir <dir>', 'Directory for stage flags')
        .option('--tracker <backend>', 'Stage tracker: file | sqlite', parseChoice<TrackerBackend>(['file', 'sqlite']))
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseChoice<LogLevel>(['error', 'warn', 'info', 'debug', 'silent']))
        .option('--json-logs', 'Output JSON logs');
}

function addDownloadOptions(command: Command): Command {
    return command
        .option('--min-citations <n>', 'Minimum citation count', parseInteger(0))
        .option('--year <range>', 'Publication year: YYYY, YYYY-YYYY, YYYY- or -YYYY')
        .option('-l, --limit <n>', 'Maximum papers to download', parseInteger(1))
        .option('-b, --batch-size <n>', 'Papers per raw batch file', parseInteger(1))
        .option('--max-retries <n>', 'Retries per request after the first attempt', parseInteger(0))
        .option('--fields <name...>', 'Fields of study to filter by')
        .option('--affiliations', 'Look up author affiliations missing from paper records')
        .option('--dry-run', 'Run the search and report what would be downloaded, writing nothing');
}

function addPrepareOptions(command: Command): Command {
    return command
        .option('--prepare-batch-size <n>', 'Rows per CSV batch file', parseInteger(1))
        .option('--malformed <policy>', 'Malformed raw records: skip | abort', parseChoice<MalformedRecordPolicy>(['skip', 'abort']));
}

function toConfigInput(options: RunOptions, query?: string, kinds?: SyntheticKind[]): EtlConfigInput {
    return {
        rawDir: options.rawDir,
        importDir: options.importDir,
        logsDir: options.logsDir,
        tracker: options.tracker,
        logLevel: options.logLevel,
        jsonLogs: options.jsonLogs,
        prepareBatchSize: options.prepareBatchSize,
        malformedRecords: options.malformed,
        download: {
            query,
            minCitations: options.minCitations,
            year: options.year,
            limit: options.limit,
            batchSize: options.batchSize,
            maxRetries: options.maxRetries,
            fieldsOfStudy: options.fields,
            affiliations: options.affiliations,
        },
        synthesize: {
            kinds: kinds && kinds.length > 0 ? kinds : options.kinds,
            seed: options.seed,
        },
        load: { enabled: options.load },
    };
}

// ─── Program ──────────────────────────────────────────────

export interface ProgramDeps extends PipelineDeps {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Receives plain status output; defaults to console.log */
    print?: (line: string) => void;
}

/**
 * Build the `citeload` command-line program.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
    const print = deps.print ?? ((line: string) => console.log(line));

    const setup = async (flags: EtlConfigInput): Promise<EtlConfig> => {
        const config = await resolveConfig(flags, { cwd: deps.cwd, env: deps.env });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        return config;
    };

    const execute = async (flags: EtlConfigInput, only?: StageName[]): Promise<void> => {
        try {
            const config = await setup(flags);
            const tracker = createStageTracker(config.tracker, config);
            try {
                const report = await runPipeline(buildStages(config, deps), tracker, { only });
                printReport(report, print);
            } finally {
                tracker.close();
            }
        } catch (error) {
            getLogger().error({ err: error }, 'Run failed');
            process.exitCode = 1;
        }
    };

    const preview = async (flags: EtlConfigInput): Promise<void> => {
        try {
            const config = await setup(flags);
            const source = (deps.createSource ?? createDefaultSource)(config);
            const plan = await planDownload(source, config.download);
            print(`${'download'.padEnd(12)}${'dry-run'.padEnd(11)}papers=${plan.papers} batches=${plan.batches} requests=${plan.requests}`);
        } catch (error) {
            getLogger().error({ err: error }, 'Dry run failed');
            process.exitCode = 1;
        }
    };

    const program: Command = new Command();

    program
        .name('citeload')
        .description('Download academic-paper metadata, build node/edge CSV tables and bulk-load them into Neo4j.')
        .version(VERSION);

    // ─── RUN command ──────────────────────────────────────

    addPrepareOptions(addDownloadOptions(addCommonOptions(
        program
            .command('run')
            .description('Run every pending stage: download, normalize, synthesize (and load with --load); --dry-run only searches')
            .argument('[query]', 'Search query (or S2_QUERY)')
    )))
        .option('--kinds <kind>', `Synthetic kind, repeatable: ${SYNTHETIC_KINDS.join(' | ')}`, collectChoice(SYNTHETIC_KINDS))
        .option('--seed <n>', 'Synthesizer seed', parseInteger(0))
        .option('--load', 'Bulk-load into Neo4j after synthesis')
        .action(async (query: string | undefined, options: RunOptions) => {
            if (options.dryRun) {
                await preview(toConfigInput(options, query));
                return;
            }
            await execute(toConfigInput(options, query));
        });

    // ─── DOWNLOAD command ─────────────────────────────────

    addDownloadOptions(addCommonOptions(
        program
            .command('download')
            .description('Download papers and references as raw JSON-lines batches')
            .argument('<query>', 'Search query')
    )).action(async (query: string, options: RunOptions) => {
        if (options.dryRun) {
            await preview(toConfigInput(options, query));
            return;
        }
        await execute(toConfigInput(options, query), ['download']);
    });

    // ─── PREPARE command ──────────────────────────────────

    addPrepareOptions(addCommonOptions(
        program
            .command('prepare')
            .description('Normalize raw batches into node/edge CSV tables')
    )).action(async (options: RunOptions) => {
        await execute(toConfigInput(options), ['normalize']);
    });

    // ─── GENERATE command ─────────────────────────────────

    addCommonOptions(
        program
            .command('generate')
            .description('Generate synthetic tables from the prepared ones')
            .argument('[kinds...]', `Kinds: ${SYNTHETIC_KINDS.join(' | ')} (default: all)`)
    )
        .option('--prepare-batch-size <n>', 'Rows per CSV batch file', parseInteger(1))
        .option('--seed <n>', 'Synthesizer seed', parseInteger(0))
        .action(async (kinds: string[], options: RunOptions) => {
            let parsed: SyntheticKind[];
            try {
                parsed = kinds.map(parseChoice(SYNTHETIC_KINDS));
            } catch (error) {
                program.error(`error: invalid kind. ${error instanceof Error ? error.message : String(error)}`);
            }
            await execute(toConfigInput(options, undefined, parsed), ['synthesize']);
        });

    // ─── LOAD command ─────────────────────────────────────

    addCommonOptions(
        program
            .command('load')
            .description('Bulk-load the CSV tables into Neo4j')
    ).action(async (options: RunOptions) => {
        await execute({ ...toConfigInput(options), load: { enabled: true } }, ['load']);
    });

    // ─── STATUS command ───────────────────────────────────

    addCommonOptions(
        program
            .command('status')
            .description('Show which stages are complete')
    ).action(async (options: RunOptions) => {
        try {
            const config = await setup(toConfigInput(options));
            const tracker = createStageTracker(config.tracker, config);
            try {
                const completed = tracker.completedStages();
                for (const stage of STAGE_NAMES) {
                    print(`${stage.padEnd(12)}${completed.includes(stage) ? 'complete' : 'pending'}`);
                }
            } finally {
                tracker.close();
            }
        } catch (error) {
            getLogger().error({ err: error }, 'Status failed');
            process.exitCode = 1;
        }
    });

    // ─── RESET command ────────────────────────────────────

    addCommonOptions(
        program
            .command('reset')
            .description('Remove stage flags so the stages run again')
            .argument('<stages...>', `Stages: ${STAGE_NAMES.join(' | ')}`)
    ).action(async (stages: string[], options: RunOptions) => {
        let parsed: StageName[];
        try {
            parsed = stages.map(parseChoice(STAGE_NAMES));
        } catch (error) {
            program.error(`error: invalid stage. ${error instanceof Error ? error.message : String(error)}`);
        }

        try {
            const config = await setup(toConfigInput(options));
            const tracker = createStageTracker(config.tracker, config);
            try {
                for (const stage of parsed) {
                    tracker.reset(stage);
                    print(`reset ${stage}`);
                }
            } finally {
                tracker.close();
            }
        } catch (error) {
            getLogger().error({ err: error }, 'Reset failed');
            process.exitCode = 1;
        }
    });

    return program;
}

function printReport(report: PipelineReport, print: (line: string) => void): void {
    for (const stage of report.stages) {
        const stats = Object.entries(stage.stats)
            .map(([key, value]) => `${key}=${value}`)
            .join(' ');
        print(`${stage.name.padEnd(12)}${stage.status.padEnd(11)}${stats}`.trimEnd());
    }
}
