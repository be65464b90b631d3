import { readColumn, readTable, writeTable, type TableWriteResult } from '../io/csv.js';
import { TABLES } from '../schema/tables.js';
import type { SeededRandom } from '../utils/random.js';
import { MissingPrerequisiteError } from '../utils/errors.js';
import { loadCityPool, loadKeywordPool, loadReviewComments } from './pools.js';

export interface GeneratorContext {
    dir: string;
    batchSize: number;
    random: SeededRandom;
    countries: readonly string[];
    reviewersPerPaper: { min: number; max: number };
    keywordsPerPaper: { min: number; max: number };
}

export interface GeneratorResult {
    tables: TableWriteResult[];
    stats: Record<string, number>;
}

/** Share of reviews that recommend acceptance */
const ACCEPT_RATE = 0.7;

/**
 * Every city of the configured countries, named `Country/City`.
 */
export function generateCities(ctx: GeneratorContext): GeneratorResult {
    const pool = loadCityPool();
    const names = new Set<string>();
    for (const country of ctx.countries) {
        for (const city of pool[country] ?? []) {
            names.add(`${country}/${city}`);
        }
    }

    const rows = [...names].map((name) => ({ name }));
    return {
        tables: [writeTable(ctx.dir, TABLES.cities, rows, ctx.batchSize)],
        stats: { cities: rows.length },
    };
}

/**
 * One random host city per proceedings.
 */
export function generateProceedingsCities(ctx: GeneratorContext): GeneratorResult {
    const proceedings = readColumn(ctx.dir, TABLES.proceedings, 'proceedingsID');
    const cities = readColumn(ctx.dir, TABLES.cities, 'name');

    if (proceedings.length > 0 && cities.length === 0) {
        throw new MissingPrerequisiteError('proceedings-cities', [`${TABLES.cities.prefix} (no rows)`]);
    }

    const rows = proceedings.map((proceedingsID) => ({ proceedingsID, city: ctx.random.pick(cities) }));
    return {
        tables: [writeTable(ctx.dir, TABLES.isHeldIn, rows, ctx.batchSize)],
        stats: { proceedings: rows.length },
    };
}

/**
 * Reviewers per paper drawn from the author table. Nobody reviews a paper
 * they wrote; when fewer eligible authors exist than the drawn count, every
 * eligible author reviews.
 */
export function generateReviews(ctx: GeneratorContext): GeneratorResult {
    const papers = readColumn(ctx.dir, TABLES.papers, 'paperID');
    const pool = readColumn(ctx.dir, TABLES.authors, 'authorID');
    const inPool = new Set(pool);
    const comments = loadReviewComments();

    const authorsByPaper = new Map<string, Set<string>>();
    for (const { paperID, authorID } of readTable(ctx.dir, TABLES.wrote)) {
        if (!paperID || !authorID) continue;
        const authors = authorsByPaper.get(paperID) ?? new Set<string>();
        authors.add(authorID);
        authorsByPaper.set(paperID, authors);
    }

    const rows: Array<{
        paperID: string;
        authorID: string;
        accepted: boolean;
        minorRevisions: number;
        majorRevisions: number;
        reviewContent: string;
    }> = [];
    let capped = 0;

    for (const paperID of papers) {
        const wanted = ctx.random.int(ctx.reviewersPerPaper.min, ctx.reviewersPerPaper.max);
        const authors = authorsByPaper.get(paperID) ?? new Set<string>();
        let excluded = 0;
        for (const author of authors) {
            if (inPool.has(author)) excluded++;
        }

        const count = Math.min(wanted, pool.length - excluded);
        if (count < wanted) capped++;

        for (const authorID of ctx.random.sample(pool, count, authors)) {
            const accepted = ctx.random.float() < ACCEPT_RATE;
            rows.push({
                paperID,
                authorID,
                accepted,
                minorRevisions: ctx.random.int(0, 4),
                majorRevisions: accepted ? ctx.random.int(0, 1) : ctx.random.int(1, 3),
                reviewContent: ctx.random.pick(accepted ? comments.accepted : comments.rejected),
            });
        }
    }

    return {
        tables: [writeTable(ctx.dir, TABLES.reviewed, rows, ctx.batchSize)],
        stats: { papers: papers.length, reviews: rows.length, cappedPapers: capped },
    };
}

/**
 * Keyword nodes from the shipped pool, and a few keywords per paper.
 */
export function generateKeywords(ctx: GeneratorContext): GeneratorResult {
    const pool = [...new Set(loadKeywordPool())].sort();
    const papers = readColumn(ctx.dir, TABLES.papers, 'paperID');

    const edges: Array<{ paperID: string; keyword: string }> = [];
    for (const paperID of papers) {
        const count = Math.min(ctx.random.int(ctx.keywordsPerPaper.min, ctx.keywordsPerPaper.max), pool.length);
        for (const keyword of ctx.random.sample(pool, count)) {
            edges.push({ paperID, keyword });
        }
    }

    return {
        tables: [
            writeTable(ctx.dir, TABLES.keywords, pool.map((name) => ({ name })), ctx.batchSize),
            writeTable(ctx.dir, TABLES.hasKeyword, edges, ctx.batchSize),
        ],
        stats: { keywords: pool.length, papers: papers.length, edges: edges.length },
    };
}
