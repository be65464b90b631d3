import { readdirSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Batch file naming: `<prefix>-<n>.<ext>`, n starting at 1.
 */
export function batchFileName(prefix: string, batch: number, ext: string): string {
    return `${prefix}-${batch}.${ext}`;
}

export interface BatchFile {
    batch: number;
    file: string;
}

/**
 * List the batch files of a table in batch order (2 before 10).
 */
export function listBatches(dir: string, prefix: string, ext: string): BatchFile[] {
    if (!existsSync(dir)) return [];

    const pattern = new RegExp(`^${escapeRegExp(prefix)}-(\\d+)\\.${escapeRegExp(ext)}$`);
    const batches: BatchFile[] = [];

    for (const name of readdirSync(dir)) {
        const match = pattern.exec(name);
        if (match?.[1]) {
            batches.push({ batch: parseInt(match[1], 10), file: join(dir, name) });
        }
    }

    return batches.sort((a, b) => a.batch - b.batch);
}

export function listBatchFiles(dir: string, prefix: string, ext: string): string[] {
    return listBatches(dir, prefix, ext).map(({ file }) => file);
}

/**
 * Remove every batch file of a table. Returns how many were removed.
 */
export function removeBatchFiles(dir: string, prefix: string, ext: string): number {
    const files = listBatchFiles(dir, prefix, ext);
    for (const file of files) {
        rmSync(file, { force: true });
    }
    return files.length;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
