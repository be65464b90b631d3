import type { MalformedRecordPolicy } from '../types/index.js';
import { writeTable, type TableWriteResult } from '../io/csv.js';
import { RawPaperSchema, RawReferenceSchema } from '../sources/schemas.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { PaperTables } from './papers.js';
import { forEachRecord } from './records.js';
import { ReferenceTables } from './references.js';

export type RecordType = 'papers' | 'references';

export interface NormalizeOptions {
    outputDir: string;
    /** Rows per CSV batch file */
    batchSize: number;
    malformedRecords: MalformedRecordPolicy;
}

export interface NormalizeReport {
    type: RecordType;
    files: number;
    records: number;
    malformed: number;
    tables: TableWriteResult[];
    /** Projection counters (duplicates, skipped authors, unresolved references...) */
    stats: Record<string, number>;
}

/**
 * Project raw JSON-lines batches onto the CSV tables of one record type.
 *
 * Files are read in the given order and every table the type owns is
 * rewritten, so rerunning on the same inputs produces identical files.
 */
export function normalizeFiles(files: readonly string[], type: RecordType, options: NormalizeOptions): NormalizeReport {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
        throw new ValidationError('Invalid normalize options', [`batch size must be an integer >= 1 (got ${options.batchSize})`]);
    }

    const logger = getLogger();

    const projection = type === 'papers' ? new PaperTables() : new ReferenceTables();
    const read =
        projection instanceof PaperTables
            ? forEachRecord(files, RawPaperSchema, options.malformedRecords, (paper) => projection.add(paper))
            : forEachRecord(files, RawReferenceSchema, options.malformedRecords, (reference) => projection.add(reference));

    const tables = projection
        .buffers()
        .map((buffer) => writeTable(options.outputDir, buffer.table, buffer.values(), options.batchSize));

    const stats: Record<string, number> = { ...projection.stats };
    logger.info({ type, files: files.length, records: read.records, malformed: read.malformed, ...stats }, 'Normalized');

    if (projection instanceof PaperTables) {
        if (projection.stats.authorsWithoutId > 0) {
            logger.warn({ authors: projection.stats.authorsWithoutId }, 'Authors without id were skipped');
        }
        if (projection.stats.unplacedPapers > 0) {
            logger.warn({ papers: projection.stats.unplacedPapers }, 'Papers without a venue id have no IsPublishedIn edge');
        }
    }

    return { type, files: files.length, records: read.records, malformed: read.malformed, tables, stats };
}

export { PaperTables } from './papers.js';
export { ReferenceTables } from './references.js';
