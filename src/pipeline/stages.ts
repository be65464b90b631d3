import { existsSync } from 'node:fs';
import type { EtlConfig, LoadConfig, ScholarlySource } from '../types/index.js';
import { fetchPapers, RAW_PAPERS_PREFIX, RAW_REFERENCES_PREFIX, validateFetchOptions } from '../fetcher/fetcher.js';
import { listBatchFiles } from '../io/batches.js';
import { tableExists } from '../io/csv.js';
import { loadGraph, Neo4jCypherRunner, type CypherRunner } from '../loader/neo4j-loader.js';
import { normalizeFiles } from '../normalizer/index.js';
import { TABLES } from '../schema/tables.js';
import { SemanticScholarSource } from '../sources/semantic-scholar.js';
import { synthesize, producedTables } from '../synthesizer/index.js';
import { MissingPrerequisiteError, ValidationError } from '../utils/errors.js';
import { getApiKey } from '../utils/config.js';
import { HttpClient } from '../utils/http-client.js';
import { VERSION } from '../version.js';
import type { StageDescriptor } from './driver.js';

export interface PipelineDeps {
    createSource?: (config: EtlConfig) => ScholarlySource;
    createCypherRunner?: (config: LoadConfig) => CypherRunner;
}

const NORMALIZED_TABLES = Object.values(TABLES).filter((table) => table.owner === 'normalize');

/**
 * Semantic Scholar over an HTTP client paced by the configured rate.
 */
export function createDefaultSource(config: EtlConfig): ScholarlySource {
    const httpClient = new HttpClient({
        version: VERSION,
        timeout: config.http.timeoutMs,
        maxRetries: config.download.maxRetries,
        initialBackoffMs: config.http.initialBackoffMs,
        maxBackoffMs: config.http.maxBackoffMs,
        rateLimits: { s2: { tokensPerSecond: config.http.requestsPerSecond, maxBurst: 1 } },
    });
    return new SemanticScholarSource(httpClient, { apiKey: getApiKey('S2_API_KEY') });
}

/**
 * The stages of a run, in order. `load` is included only when enabled.
 * Collaborators are created when their stage runs, not before.
 */
export function buildStages(config: EtlConfig, deps: PipelineDeps = {}): StageDescriptor[] {
    const createSource = deps.createSource ?? createDefaultSource;
    const createCypherRunner = deps.createCypherRunner ?? ((load: LoadConfig) => new Neo4jCypherRunner(load));
    const rawFiles = (prefix: string): string[] => listBatchFiles(config.rawDir, prefix, 'jsonl');

    const stages: StageDescriptor[] = [
        {
            name: 'download',
            precondition: () => {
                validateFetchOptions(config.download);
            },
            action: async () => {
                const report = await fetchPapers(createSource(config), { ...config.download, outputDir: config.rawDir });
                const stats = { papers: report.papers, references: report.references, batches: report.batches.length, requests: report.requests };
                return config.download.affiliations ? { ...stats, affiliatedAuthors: report.affiliatedAuthors } : stats;
            },
            postcondition: () =>
                [RAW_PAPERS_PREFIX, RAW_REFERENCES_PREFIX]
                    .filter((prefix) => rawFiles(prefix).length === 0)
                    .map((prefix) => `${prefix}-*.jsonl`),
        },
        {
            name: 'normalize',
            precondition: () => {
                if (rawFiles(RAW_PAPERS_PREFIX).length === 0) {
                    throw new MissingPrerequisiteError('normalize', [`${RAW_PAPERS_PREFIX}-*.jsonl in ${config.rawDir}`]);
                }
            },
            action: async () => {
                const options = {
                    outputDir: config.importDir,
                    batchSize: config.prepareBatchSize,
                    malformedRecords: config.malformedRecords,
                };
                const papers = normalizeFiles(rawFiles(RAW_PAPERS_PREFIX), 'papers', options);
                const references = normalizeFiles(rawFiles(RAW_REFERENCES_PREFIX), 'references', options);
                return {
                    papers: papers.stats['papers'] ?? 0,
                    citations: references.stats['citations'] ?? 0,
                    malformed: papers.malformed + references.malformed,
                };
            },
            postcondition: () =>
                NORMALIZED_TABLES.filter((table) => !tableExists(config.importDir, table)).map((table) => table.prefix),
        },
        {
            name: 'synthesize',
            action: async () => {
                if (config.synthesize.kinds.length === 0) return {};
                const reports = synthesize(config.synthesize.kinds, {
                    ...config.synthesize,
                    outputDir: config.importDir,
                    batchSize: config.prepareBatchSize,
                });
                return Object.fromEntries(reports.map((report) => [report.kind, report.tables.reduce((sum, t) => sum + t.rows, 0)]));
            },
            postcondition: () =>
                config.synthesize.kinds
                    .flatMap((kind) => producedTables(kind))
                    .filter((prefix) => listBatchFiles(config.importDir, prefix, 'csv').length === 0),
        },
    ];

    if (config.load.enabled) {
        stages.push({
            name: 'load',
            precondition: () => {
                if (!existsSync(config.load.script)) {
                    throw new ValidationError('Invalid load options', [`script not found: ${config.load.script}`]);
                }
            },
            action: async () => {
                const runner = createCypherRunner(config.load);
                try {
                    const report = await loadGraph(runner, { script: config.load.script, importDir: config.importDir });
                    return { statements: report.statements, skippedTables: report.skipped.length };
                } finally {
                    await runner.close();
                }
            },
        });
    }

    return stages;
}
