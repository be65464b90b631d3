import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { DownloadConfig, PaperSearchQuery, ScholarlySource } from '../types/index.js';
import type { RawPaper, RawReference } from '../sources/schemas.js';
import { batchFileName, removeBatchFiles } from '../io/batches.js';
import { writeJsonl } from '../io/jsonl.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { formatYearFilter, parseYearFilter } from './year-filter.js';

export const RAW_PAPERS_PREFIX = 'raw-papers';
export const RAW_REFERENCES_PREFIX = 'raw-references';

export interface FetchOptions extends DownloadConfig {
    outputDir: string;
}

export interface FetchBatch {
    batch: number;
    papers: number;
    references: number;
    papersFile: string;
    referencesFile: string;
}

export interface FetchReport {
    papers: number;
    references: number;
    batches: FetchBatch[];
    /** Authors given affiliations by the author lookup */
    affiliatedAuthors: number;
    /** HTTP requests made, retries included */
    requests: number;
}

export interface DownloadPlan {
    papers: number;
    batches: number;
    requests: number;
}

/**
 * Check every download input. Runs before any network or file access.
 * @returns the search query in the source's terms
 * @throws ValidationError listing every problem found
 */
export function validateFetchOptions(options: DownloadConfig): PaperSearchQuery {
    const issues: string[] = [];

    const query = options.query?.trim() ?? '';
    if (!query) issues.push('query is required');
    if (!Number.isInteger(options.limit) || options.limit < 1) issues.push(`limit must be an integer >= 1 (got ${options.limit})`);
    if (options.batchSize !== null && (!Number.isInteger(options.batchSize) || options.batchSize < 1)) {
        issues.push(`batch size must be an integer >= 1 (got ${options.batchSize})`);
    }
    if (!Number.isInteger(options.minCitations) || options.minCitations < 0) {
        issues.push(`min citations must be an integer >= 0 (got ${options.minCitations})`);
    }
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
        issues.push(`max retries must be an integer >= 0 (got ${options.maxRetries})`);
    }

    let year: string | undefined;
    try {
        year = formatYearFilter(parseYearFilter(options.year));
    } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        issues.push(error.message);
    }

    if (issues.length > 0) {
        throw new ValidationError('Invalid download options', issues);
    }

    return {
        query,
        minCitations: options.minCitations,
        year,
        fieldsOfStudy: options.fieldsOfStudy,
    };
}

/**
 * Download papers and their references as raw JSON-lines batches:
 *
 * 1. Page through the search until `limit` unique ids are collected
 * 2. Split the ids into batches of `batchSize`
 * 3. Per batch, fetch details (with author affiliations when enabled)
 *    → `raw-papers-<n>.jsonl`, then references → `raw-references-<n>.jsonl`
 *
 * A failure aborts the download; batches written before it stay on disk.
 */
export async function fetchPapers(source: ScholarlySource, options: FetchOptions): Promise<FetchReport> {
    const logger = getLogger();
    const query = validateFetchOptions(options);
    const requestsBefore = source.requestCount();

    mkdirSync(options.outputDir, { recursive: true });
    removeBatchFiles(options.outputDir, RAW_PAPERS_PREFIX, 'jsonl');
    removeBatchFiles(options.outputDir, RAW_REFERENCES_PREFIX, 'jsonl');

    const paperIds = await collectPaperIds(source, query, options.limit);
    logger.info({ query: query.query, papers: paperIds.length, limit: options.limit }, 'Search complete');

    const chunks = chunk(paperIds, options.batchSize ?? Math.max(1, paperIds.length));
    const report: FetchReport = { papers: 0, references: 0, batches: [], affiliatedAuthors: 0, requests: 0 };

    for (const [index, ids] of chunks.entries()) {
        const batch = index + 1;
        let papers = await source.fetchPaperDetails(ids);
        if (options.affiliations) {
            const enriched = await addAffiliations(source, papers);
            papers = enriched.papers;
            report.affiliatedAuthors += enriched.authors;
        }
        const papersFile = join(options.outputDir, batchFileName(RAW_PAPERS_PREFIX, batch, 'jsonl'));
        writeJsonl(papersFile, papers);

        const references: RawReference[] = [];
        for (const paper of papers) {
            for (const reference of await source.fetchReferences(paper.paperId)) {
                references.push(reference);
            }
        }
        const referencesFile = join(options.outputDir, batchFileName(RAW_REFERENCES_PREFIX, batch, 'jsonl'));
        writeJsonl(referencesFile, references);

        logger.info({ batch, papers: papers.length, references: references.length }, 'Batch saved');
        report.papers += papers.length;
        report.references += references.length;
        report.batches.push({ batch, papers: papers.length, references: references.length, papersFile, referencesFile });
    }

    report.requests = source.requestCount() - requestsBefore;
    return report;
}

/**
 * Run the search alone and report what a download would write. Nothing is
 * written and no paper details are fetched.
 */
export async function planDownload(source: ScholarlySource, options: DownloadConfig): Promise<DownloadPlan> {
    const query = validateFetchOptions(options);
    const requestsBefore = source.requestCount();

    const paperIds = await collectPaperIds(source, query, options.limit);
    const batches = chunk(paperIds, options.batchSize ?? Math.max(1, paperIds.length)).length;
    getLogger().info({ query: query.query, papers: paperIds.length, batches }, 'Dry run: nothing written');

    return { papers: paperIds.length, batches, requests: source.requestCount() - requestsBefore };
}

/**
 * Fill in the affiliations of authors whose paper record carries none,
 * from one author lookup per batch.
 */
async function addAffiliations(source: ScholarlySource, papers: RawPaper[]): Promise<{ papers: RawPaper[]; authors: number }> {
    const pending = new Set<string>();
    for (const paper of papers) {
        for (const author of paper.authors ?? []) {
            if (author.authorId && !author.affiliations?.length) pending.add(author.authorId);
        }
    }
    if (pending.size === 0) return { papers, authors: 0 };

    const found = await source.fetchAuthorAffiliations([...pending]);
    getLogger().debug({ requested: pending.size, found: found.size }, 'Author affiliations fetched');

    const enriched = papers.map((paper): RawPaper => {
        if (!paper.authors) return paper;
        const authors = paper.authors.map((author) => {
            const affiliations = author.authorId && !author.affiliations?.length ? found.get(author.authorId) : undefined;
            return affiliations ? { ...author, affiliations } : author;
        });
        return { ...paper, authors };
    });
    return { papers: enriched, authors: found.size };
}

/**
 * Follow continuation tokens until `limit` unique ids are collected or the
 * source runs out. Ids repeated across pages are kept once. A page that adds
 * no new id, or a token seen before, ends the search.
 */
async function collectPaperIds(source: ScholarlySource, query: PaperSearchQuery, limit: number): Promise<string[]> {
    const logger = getLogger();
    const ids: string[] = [];
    const seen = new Set<string>();
    const tokens = new Set<string>();
    let token: string | undefined;
    let duplicates = 0;

    do {
        const page = await source.searchPage(query, token);
        const before = ids.length;
        for (const id of page.paperIds) {
            if (ids.length >= limit) break;
            if (seen.has(id)) {
                duplicates++;
                continue;
            }
            seen.add(id);
            ids.push(id);
        }
        token = page.token ?? undefined;

        if (token !== undefined && ids.length < limit) {
            if (ids.length === before) {
                logger.warn({ token, papers: ids.length }, 'Search page added no new ids; stopping');
                break;
            }
            if (tokens.has(token)) {
                logger.warn({ token, papers: ids.length }, 'Search returned a repeated token; stopping');
                break;
            }
            tokens.add(token);
        }
    } while (token && ids.length < limit);

    if (duplicates > 0) {
        logger.debug({ duplicates }, 'Dropped repeated ids across search pages');
    }

    return ids;
}

/**
 * Split into consecutive chunks of at most `size`. Always at least one chunk.
 */
function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks.length > 0 ? chunks : [[]];
}
