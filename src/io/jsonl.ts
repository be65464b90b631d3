import { readFileSync, writeFileSync } from 'node:fs';

export interface JsonlLine {
    /** 1-based line number in the file */
    lineNumber: number;
    text: string;
}

/**
 * Write records as newline-delimited JSON, one record per line.
 */
export function writeJsonl(filePath: string, records: readonly unknown[]): void {
    const body = records.map((record) => JSON.stringify(record) + '\n').join('');
    writeFileSync(filePath, body, 'utf-8');
}

/**
 * Read the non-blank lines of a JSON-lines file without decoding them.
 */
export function readJsonlLines(filePath: string): JsonlLine[] {
    const lines: JsonlLine[] = [];
    readFileSync(filePath, 'utf-8')
        .split('\n')
        .forEach((text, index) => {
            if (text.trim().length > 0) {
                lines.push({ lineNumber: index + 1, text });
            }
        });
    return lines;
}
