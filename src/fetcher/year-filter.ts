import { ValidationError } from '../utils/errors.js';

/**
 * Publication-year filter, both ends inclusive. A null end is open.
 */
export interface YearFilter {
    from: number | null;
    to: number | null;
}

const YEAR = /^\d{4}$/;

/**
 * Parse `YYYY`, `YYYY-YYYY`, `YYYY-` or `-YYYY`.
 * @throws ValidationError for anything else, or a range whose start is after its end
 */
export function parseYearFilter(input: string): YearFilter {
    const value = input.trim();

    if (YEAR.test(value)) {
        const year = parseInt(value, 10);
        return { from: year, to: year };
    }

    const parts = value.split('-');
    if (parts.length !== 2) {
        throw new ValidationError(`Invalid year filter "${input}"`, ['expected YYYY, YYYY-YYYY, YYYY- or -YYYY']);
    }

    const [start = '', end = ''] = parts;
    if ((start && !YEAR.test(start)) || (end && !YEAR.test(end)) || (!start && !end)) {
        throw new ValidationError(`Invalid year filter "${input}"`, ['expected YYYY, YYYY-YYYY, YYYY- or -YYYY']);
    }

    const from = start ? parseInt(start, 10) : null;
    const to = end ? parseInt(end, 10) : null;
    if (from !== null && to !== null && from > to) {
        throw new ValidationError(`Invalid year filter "${input}"`, [`range start ${from} is after range end ${to}`]);
    }

    return { from, to };
}

/**
 * Format a filter in the API's syntax.
 */
export function formatYearFilter(filter: YearFilter): string {
    if (filter.from !== null && filter.from === filter.to) return String(filter.from);
    return `${filter.from ?? ''}-${filter.to ?? ''}`;
}
