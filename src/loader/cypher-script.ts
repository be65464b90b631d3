import { listBatches } from '../io/batches.js';

export const BATCH_PLACEHOLDER = '{batch}';

export interface CypherStatement {
    text: string;
    /** Table prefix of the CSV file the statement loads, if any */
    prefix: string | null;
    /** Every `row.<column>` the statement reads */
    columns: string[];
}

export interface PlannedStatement {
    text: string;
    prefix: string | null;
    batch: number | null;
}

const FILE_URL = /'file:\/\/\/([A-Za-z0-9_-]+)-\{batch\}\.csv'/;
const ROW_COLUMN = /\brow\.([A-Za-z_][A-Za-z0-9_]*)/g;
const SCHEMA_VERSION_HEADER = /^\/\/\s*schema-version:\s*(\d+)\s*$/m;

/**
 * Table schema version a script declares in its `// schema-version: <n>`
 * comment, or null when it declares none.
 */
export function readSchemaVersion(source: string): number | null {
    const match = SCHEMA_VERSION_HEADER.exec(source);
    return match?.[1] === undefined ? null : Number(match[1]);
}

/**
 * Split a Cypher script into statements. Statements end with `;` at the end
 * of a line; lines starting with `//` are comments.
 */
export function parseCypherScript(source: string): CypherStatement[] {
    const body = source
        .split('\n')
        .filter((line) => !line.trimStart().startsWith('//'))
        .join('\n');

    return body
        .split(/;[ \t]*(?:\r?\n|$)/)
        .map((text) => text.trim())
        .filter((text) => text.length > 0)
        .map((text) => ({
            text,
            prefix: FILE_URL.exec(text)?.[1] ?? null,
            columns: [...new Set(Array.from(text.matchAll(ROW_COLUMN), (match) => match[1] ?? ''))],
        }));
}

/**
 * Expand each file-loading statement once per batch file of its table found
 * in `importDir`. Statements without a file run once. Tables with no batch
 * files are reported in `skipped`.
 */
export function planStatements(
    statements: readonly CypherStatement[],
    importDir: string
): { planned: PlannedStatement[]; skipped: string[] } {
    const planned: PlannedStatement[] = [];
    const skipped: string[] = [];

    for (const statement of statements) {
        if (statement.prefix === null) {
            planned.push({ text: statement.text, prefix: null, batch: null });
            continue;
        }

        const batches = listBatches(importDir, statement.prefix, 'csv');
        if (batches.length === 0) {
            skipped.push(statement.prefix);
            continue;
        }

        for (const { batch } of batches) {
            planned.push({
                text: statement.text.replaceAll(BATCH_PLACEHOLDER, String(batch)),
                prefix: statement.prefix,
                batch,
            });
        }
    }

    return { planned, skipped };
}
