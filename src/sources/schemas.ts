import { z } from 'zod';

/**
 * Response and raw-record schemas for the Semantic Scholar Graph API.
 *
 * Paper objects pass unknown keys through so that raw batch files keep the
 * full API payload; the normalizer only relies on the keys declared here.
 */

const nullishString = z.string().nullish();

export const RawAuthorSchema = z
    .object({
        authorId: z.string().nullable(),
        url: nullishString,
        name: nullishString,
        affiliations: z.array(z.string()).nullish(),
        homepage: nullishString,
        hIndex: z.union([z.number(), z.string()]).nullish(),
    })
    .passthrough();

export const RawVenueSchema = z
    .object({
        id: nullishString,
        name: nullishString,
        type: nullishString,
        alternate_names: z.array(z.string()).nullish(),
        url: nullishString,
    })
    .passthrough();

export const RawJournalSchema = z
    .object({
        name: nullishString,
        volume: nullishString,
        pages: nullishString,
    })
    .passthrough();

export const RawPaperSchema = z
    .object({
        paperId: z.string().min(1),
        url: nullishString,
        title: nullishString,
        abstract: nullishString,
        year: z.number().int().nullish(),
        isOpenAccess: z.boolean().nullish(),
        openAccessPdf: z.object({ url: nullishString }).passthrough().nullish(),
        publicationTypes: z.array(z.string()).nullish(),
        embedding: z
            .object({ model: nullishString, vector: z.array(z.number()) })
            .passthrough()
            .nullish(),
        tldr: z.object({ model: nullishString, text: nullishString }).passthrough().nullish(),
        authors: z.array(RawAuthorSchema).nullish(),
        fieldsOfStudy: z.array(z.string()).nullish(),
        journal: RawJournalSchema.nullish(),
        publicationVenue: RawVenueSchema.nullish(),
    })
    .passthrough();

export const ContextWithIntentSchema = z.object({
    context: z.string(),
    intents: z.array(z.string()).nullish(),
});

/**
 * One item of `GET /paper/{id}/references`.
 */
export const ReferenceItemSchema = z.object({
    citedPaper: z.object({ paperId: z.string().nullable() }),
    isInfluential: z.boolean().nullish(),
    contextsWithIntent: z.array(ContextWithIntentSchema).nullish(),
});

/**
 * A line of `raw-references-<n>.jsonl`: a reference item tagged with the
 * paper that cites it.
 */
export const RawReferenceSchema = ReferenceItemSchema.extend({
    citingPaper: z.object({ paperId: z.string().min(1) }),
});

export const SearchBulkResponseSchema = z.object({
    total: z.number().optional(),
    token: z.string().nullish(),
    data: z.array(z.object({ paperId: z.string() }).passthrough()),
});

export const PaperBatchResponseSchema = z.array(RawPaperSchema.nullable());

/**
 * `POST /author/batch?fields=affiliations`; unknown ids come back as null.
 */
export const AuthorBatchResponseSchema = z.array(
    z
        .object({
            authorId: z.string(),
            affiliations: z.array(z.string()).nullish(),
        })
        .passthrough()
        .nullable()
);

export const ReferencesResponseSchema = z.object({
    offset: z.number().optional(),
    next: z.number().nullish(),
    data: z.array(ReferenceItemSchema),
});

export type RawAuthor = z.infer<typeof RawAuthorSchema>;
export type RawVenue = z.infer<typeof RawVenueSchema>;
export type RawPaper = z.infer<typeof RawPaperSchema>;
export type ReferenceItem = z.infer<typeof ReferenceItemSchema>;
export type RawReference = z.infer<typeof RawReferenceSchema>;
export type SearchBulkResponse = z.infer<typeof SearchBulkResponseSchema>;
export type ReferencesResponse = z.infer<typeof ReferencesResponseSchema>;
