import type { z } from 'zod';
import type { MalformedRecordPolicy } from '../types/index.js';
import { readJsonlLines } from '../io/jsonl.js';
import { MalformedRecordError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ReadStats {
    records: number;
    malformed: number;
}

/**
 * Decode and validate every line of the given JSON-lines files, in order,
 * handing each valid record to `onRecord`.
 *
 * Under `skip` a malformed line is logged and counted; under `abort` its
 * MalformedRecordError propagates and ends the run.
 */
export function forEachRecord<T>(
    files: readonly string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    policy: MalformedRecordPolicy,
    onRecord: (record: T) => void
): ReadStats {
    const logger = getLogger();
    const stats: ReadStats = { records: 0, malformed: 0 };

    const reject = (error: MalformedRecordError): void => {
        if (policy === 'abort') throw error;
        stats.malformed++;
        logger.warn({ file: error.file, line: error.line }, error.message);
    };

    for (const file of files) {
        for (const { lineNumber, text } of readJsonlLines(file)) {
            let decoded: unknown;
            try {
                decoded = JSON.parse(text);
            } catch {
                reject(new MalformedRecordError(file, lineNumber, 'invalid JSON'));
                continue;
            }

            const parsed = schema.safeParse(decoded);
            if (!parsed.success) {
                const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
                reject(new MalformedRecordError(file, lineNumber, reason));
                continue;
            }

            stats.records++;
            onRecord(parsed.data);
        }
    }

    return stats;
}
