/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Pipeline stages, in execution order.
 */
export const STAGE_NAMES = ['download', 'normalize', 'synthesize', 'load'] as const;
export type StageName = (typeof STAGE_NAMES)[number];

/**
 * Synthetic table kinds, in the order the synthesizer runs them.
 */
export const SYNTHETIC_KINDS = ['cities', 'proceedings-cities', 'reviews', 'keywords'] as const;
export type SyntheticKind = (typeof SYNTHETIC_KINDS)[number];

/**
 * What to do with a raw record that fails schema projection.
 * Applies to the whole run.
 */
export type MalformedRecordPolicy = 'skip' | 'abort';

/**
 * Stage flag backend.
 */
export type TrackerBackend = 'file' | 'sqlite';

/**
 * Download (Fetcher) settings.
 */
export interface DownloadConfig {
    query?: string;
    minCitations: number;
    /** `YYYY`, `YYYY-YYYY`, `YYYY-` or `-YYYY` */
    year: string;
    limit: number;
    /** Papers per raw batch file; a single batch when null */
    batchSize: number | null;
    maxRetries: number;
    fieldsOfStudy?: string[];
    /** Look up author affiliations the paper records leave empty */
    affiliations: boolean;
}

/**
 * HTTP pacing and retry settings.
 */
export interface HttpConfig {
    requestsPerSecond: number;
    timeoutMs: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
}

/**
 * Synthesizer settings.
 */
export interface SynthesizeConfig {
    kinds: SyntheticKind[];
    seed: number;
    countries: string[];
    reviewersPerPaper: { min: number; max: number };
    keywordsPerPaper: { min: number; max: number };
}

/**
 * Neo4j bulk-load settings.
 */
export interface LoadConfig {
    enabled: boolean;
    uri: string;
    user: string;
    password?: string;
    database: string;
    script: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface EtlConfig {
    // Directories
    rawDir: string;
    importDir: string;
    logsDir: string;

    // Stage tracking
    tracker: TrackerBackend;
    trackerDb: string;

    // Stages
    download: DownloadConfig;
    prepareBatchSize: number;
    malformedRecords: MalformedRecordPolicy;
    synthesize: SynthesizeConfig;
    load: LoadConfig;
    http: HttpConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial configuration as read from a file, the environment or CLI flags.
 * Nested sections merge per key.
 */
export type EtlConfigInput = Partial<
    Omit<EtlConfig, 'download' | 'synthesize' | 'load' | 'http'>
> & {
    download?: Partial<DownloadConfig>;
    synthesize?: Partial<SynthesizeConfig>;
    load?: Partial<LoadConfig>;
    http?: Partial<HttpConfig>;
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EtlConfig = {
    rawDir: './data/raw',
    importDir: './data/import',
    logsDir: './data/logs',
    tracker: 'file',
    trackerDb: './data/logs/stages.db',
    download: {
        minCitations: 1,
        year: '1900-9999',
        limit: 100,
        batchSize: null,
        maxRetries: 3,
        affiliations: false,
    },
    prepareBatchSize: 10000,
    malformedRecords: 'skip',
    synthesize: {
        kinds: ['cities', 'proceedings-cities', 'reviews', 'keywords'],
        seed: 42,
        countries: ['Spain'],
        reviewersPerPaper: { min: 3, max: 5 },
        keywordsPerPaper: { min: 1, max: 3 },
    },
    load: {
        enabled: false,
        uri: 'neo4j://localhost:7687',
        user: 'neo4j',
        database: 'neo4j',
        script: './cypher/load_data.cyp',
    },
    http: {
        requestsPerSecond: 1,
        timeoutMs: 30000,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
    },
    logLevel: 'info',
    jsonLogs: false,
};
