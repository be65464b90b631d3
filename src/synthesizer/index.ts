import { SYNTHETIC_KINDS, type SynthesizeConfig, type SyntheticKind } from '../types/index.js';
import { tableExists } from '../io/csv.js';
import { TABLES, type TableDefinition } from '../schema/tables.js';
import { MissingPrerequisiteError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { SeededRandom } from '../utils/random.js';
import {
    generateCities,
    generateKeywords,
    generateProceedingsCities,
    generateReviews,
    type GeneratorContext,
    type GeneratorResult,
} from './generators.js';
import { loadCityPool } from './pools.js';

export interface SynthesizeOptions extends Omit<SynthesizeConfig, 'kinds'> {
    outputDir: string;
    /** Rows per CSV batch file */
    batchSize: number;
}

export interface KindReport extends GeneratorResult {
    kind: SyntheticKind;
}

interface KindDefinition {
    requires: TableDefinition[];
    produces: TableDefinition[];
    generate: (ctx: GeneratorContext) => GeneratorResult;
}

const KINDS: Record<SyntheticKind, KindDefinition> = {
    cities: {
        requires: [],
        produces: [TABLES.cities],
        generate: generateCities,
    },
    'proceedings-cities': {
        requires: [TABLES.proceedings, TABLES.cities],
        produces: [TABLES.isHeldIn],
        generate: generateProceedingsCities,
    },
    reviews: {
        requires: [TABLES.papers, TABLES.authors, TABLES.wrote],
        produces: [TABLES.reviewed],
        generate: generateReviews,
    },
    keywords: {
        requires: [TABLES.papers],
        produces: [TABLES.keywords, TABLES.hasKeyword],
        generate: generateKeywords,
    },
};

/**
 * Tables each kind writes, by prefix.
 */
export function producedTables(kind: SyntheticKind): string[] {
    return KINDS[kind].produces.map((table) => table.prefix);
}

/**
 * Generate the requested synthetic tables.
 *
 * Kinds run in canonical order whatever order they are requested in. Every
 * prerequisite is checked before the first write; a table counts as present
 * when it is on disk or an earlier requested kind writes it.
 *
 * Each kind draws from its own generator seeded with `seed` plus the kind's
 * canonical index, so its output does not depend on the other kinds requested.
 */
export function synthesize(kinds: readonly SyntheticKind[], options: SynthesizeOptions): KindReport[] {
    const logger = getLogger();
    validateSynthesizeOptions(kinds, options);

    const ordered = SYNTHETIC_KINDS.filter((kind) => kinds.includes(kind));
    checkPrerequisites(ordered, options.outputDir);

    const reports: KindReport[] = [];
    for (const kind of ordered) {
        const ctx: GeneratorContext = {
            dir: options.outputDir,
            batchSize: options.batchSize,
            random: new SeededRandom(options.seed + SYNTHETIC_KINDS.indexOf(kind)),
            countries: options.countries,
            reviewersPerPaper: options.reviewersPerPaper,
            keywordsPerPaper: options.keywordsPerPaper,
        };

        const result = KINDS[kind].generate(ctx);
        logger.info({ kind, ...result.stats }, 'Generated');
        if (result.stats['cappedPapers']) {
            logger.warn({ papers: result.stats['cappedPapers'] }, 'Not enough eligible reviewers; reviews capped');
        }
        reports.push({ kind, ...result });
    }

    return reports;
}

function validateSynthesizeOptions(kinds: readonly SyntheticKind[], options: SynthesizeOptions): void {
    const issues: string[] = [];

    if (kinds.length === 0) issues.push('at least one kind is required');
    if (!Number.isInteger(options.seed)) issues.push(`seed must be an integer (got ${options.seed})`);
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
        issues.push(`batch size must be an integer >= 1 (got ${options.batchSize})`);
    }

    for (const [name, range] of [
        ['reviewers per paper', options.reviewersPerPaper],
        ['keywords per paper', options.keywordsPerPaper],
    ] as const) {
        if (!Number.isInteger(range.min) || !Number.isInteger(range.max) || range.min < 0 || range.min > range.max) {
            issues.push(`${name} must be a range 0 <= min <= max (got ${range.min}-${range.max})`);
        }
    }

    if (kinds.includes('cities')) {
        const pool = loadCityPool();
        if (options.countries.length === 0) issues.push('at least one country is required');
        const unknown = options.countries.filter((country) => !Object.hasOwn(pool, country));
        if (unknown.length > 0) issues.push(`unknown countries: ${unknown.join(', ')}`);
    }

    if (issues.length > 0) {
        throw new ValidationError('Invalid synthesize options', issues);
    }
}

function checkPrerequisites(kinds: readonly SyntheticKind[], dir: string): void {
    const produced = new Set<string>();
    const failing: string[] = [];
    const missing = new Set<string>();

    for (const kind of kinds) {
        const absent = KINDS[kind].requires.filter((table) => !produced.has(table.prefix) && !tableExists(dir, table));
        if (absent.length > 0) {
            failing.push(kind);
            for (const table of absent) missing.add(table.prefix);
        }
        for (const table of KINDS[kind].produces) produced.add(table.prefix);
    }

    if (failing.length > 0) {
        throw new MissingPrerequisiteError(failing.join(', '), [...missing]);
    }
}
