import { readFileSync } from 'node:fs';
import { z } from 'zod';

const CitiesSchema = z.record(z.string(), z.array(z.string().min(1)));
const KeywordsSchema = z.array(z.string().min(1)).min(1);
const ReviewCommentsSchema = z.object({
    accepted: z.array(z.string().min(1)).min(1),
    rejected: z.array(z.string().min(1)).min(1),
});

export type CityPool = z.infer<typeof CitiesSchema>;
export type ReviewComments = z.infer<typeof ReviewCommentsSchema>;

function readPool<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const file = new URL(`../../data/${name}`, import.meta.url);
    return schema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

/** Cities per country */
export function loadCityPool(): CityPool {
    return readPool('cities.json', CitiesSchema);
}

export function loadKeywordPool(): string[] {
    return readPool('keywords.json', KeywordsSchema);
}

export function loadReviewComments(): ReviewComments {
    return readPool('review-comments.json', ReviewCommentsSchema);
}
