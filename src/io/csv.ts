import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { csvFormatRow, csvParse, type DSVRowString } from 'd3-dsv';
import type { CsvValue, TableDefinition } from '../schema/tables.js';
import { MalformedRecordError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { batchFileName, listBatchFiles, removeBatchFiles } from './batches.js';

/**
 * Collects the rows of one table, keeping the first row seen per natural key.
 */
export class TableBuffer<C extends string> {
    private readonly rows = new Map<string, Record<C, CsvValue>>();

    constructor(readonly table: TableDefinition<C>) {}

    /**
     * Add a row. Returns false when a row with the same key is already buffered.
     */
    add(row: Record<C, CsvValue>): boolean {
        const key = naturalKey(this.table, row);
        if (this.rows.has(key)) return false;
        this.rows.set(key, row);
        return true;
    }

    get size(): number {
        return this.rows.size;
    }

    values(): Array<Record<C, CsvValue>> {
        return [...this.rows.values()];
    }
}

export interface TableWriteResult {
    prefix: string;
    files: string[];
    rows: number;
}

/**
 * Write a table as batch files of at most `batchSize` rows, each with its own
 * header. Rows are sorted by natural key; stale batches of the same table are
 * removed first. An empty table still gets `<prefix>-1.csv` with a header.
 */
export function writeTable<C extends string>(
    dir: string,
    table: TableDefinition<C>,
    rows: ReadonlyArray<Record<C, CsvValue>>,
    batchSize: number
): TableWriteResult {
    mkdirSync(dir, { recursive: true });
    removeBatchFiles(dir, table.prefix, 'csv');

    const sorted = [...rows].sort((a, b) => compareKeys(table, a, b));
    const header = csvFormatRow([...table.columns]);
    const files: string[] = [];

    const batchCount = Math.max(1, Math.ceil(sorted.length / batchSize));
    for (let batch = 1; batch <= batchCount; batch++) {
        const slice = sorted.slice((batch - 1) * batchSize, batch * batchSize);
        const lines = [header, ...slice.map((row) => csvFormatRow(table.columns.map((column) => toCell(row[column]))))];

        const filePath = join(dir, batchFileName(table.prefix, batch, 'csv'));
        writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8');
        files.push(filePath);
    }

    getLogger().debug({ table: table.prefix, rows: sorted.length, files: files.length }, 'Table written');
    return { prefix: table.prefix, files, rows: sorted.length };
}

/**
 * Read every batch of a table. Each file's header must match the table's columns.
 */
export function readTable<C extends string>(dir: string, table: TableDefinition<C>): Array<DSVRowString<C>> {
    const rows: Array<DSVRowString<C>> = [];

    for (const file of listBatchFiles(dir, table.prefix, 'csv')) {
        const parsed = csvParse<C>(readFileSync(file, 'utf-8'));
        const expected = table.columns.join(',');
        if (parsed.columns.join(',') !== expected) {
            throw new MalformedRecordError(file, 1, `header "${parsed.columns.join(',')}" does not match "${expected}"`);
        }
        for (const row of parsed) rows.push(row);
    }

    return rows;
}

/**
 * Distinct non-empty values of one column across every batch, sorted.
 */
export function readColumn<C extends string>(dir: string, table: TableDefinition<C>, column: C): string[] {
    const values = new Set<string>();
    for (const row of readTable(dir, table)) {
        const value = row[column];
        if (value) values.add(value);
    }
    return [...values].sort();
}

/**
 * True when at least one batch file of the table exists.
 */
export function tableExists(dir: string, table: TableDefinition): boolean {
    return listBatchFiles(dir, table.prefix, 'csv').length > 0;
}

/**
 * Cell encoding: null → empty, everything else via String().
 */
export function toCell(value: CsvValue): string {
    return value === null ? '' : String(value);
}

function naturalKey<C extends string>(table: TableDefinition<C>, row: Record<C, CsvValue>): string {
    return JSON.stringify(table.key.map((column) => toCell(row[column])));
}

function compareKeys<C extends string>(table: TableDefinition<C>, a: Record<C, CsvValue>, b: Record<C, CsvValue>): number {
    for (const column of table.key) {
        const left = toCell(a[column]);
        const right = toCell(b[column]);
        if (left < right) return -1;
        if (left > right) return 1;
    }
    return 0;
}
