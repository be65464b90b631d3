import type { PaperSearchQuery, ScholarlySource, SearchPage, SourceOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    AuthorBatchResponseSchema,
    PaperBatchResponseSchema,
    ReferencesResponseSchema,
    SearchBulkResponseSchema,
    type RawPaper,
    type RawReference,
} from './schemas.js';

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request for full paper records */
export const PAPER_DETAIL_FIELDS = [
    'paperId', 'url', 'title', 'abstract', 'year',
    'isOpenAccess', 'openAccessPdf', 'publicationTypes',
    'embedding', 'tldr',
    'authors.authorId', 'authors.url', 'authors.name', 'authors.affiliations',
    'authors.homepage', 'authors.hIndex',
    'fieldsOfStudy', 'journal', 'publicationVenue',
].join(',');

/** Fields to request for each outgoing reference */
export const REFERENCE_FIELDS = ['citedPaper.paperId', 'isInfluential', 'contextsWithIntent'].join(',');

/** The batch endpoint accepts at most 500 ids per request */
const DETAILS_BATCH_SIZE = 500;

/** The author batch endpoint accepts at most 1000 ids per request */
const AUTHOR_BATCH_SIZE = 1000;

/** Page size for reference listings */
const REFERENCES_PAGE_SIZE = 1000;

/** offset + limit must stay below this on listing endpoints */
const MAX_RESULT_WINDOW = 10_000;

/**
 * Semantic Scholar Graph API source.
 *
 * @see https://api.semanticscholar.org/api-docs/graph
 */
export class SemanticScholarSource implements ScholarlySource {
    readonly name = 'Semantic Scholar';
    private readonly apiKey?: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options?: SourceOptions
    ) {
        this.apiKey = options?.apiKey ?? process.env['S2_API_KEY'];
        this.baseUrl = options?.baseUrl ?? S2_BASE;
    }

    async searchPage(query: PaperSearchQuery, token?: string): Promise<SearchPage> {
        const params = new URLSearchParams({ query: query.query, fields: 'paperId' });
        if (query.minCitations) params.set('minCitationCount', String(query.minCitations));
        if (query.year) params.set('year', query.year);
        if (query.fieldsOfStudy && query.fieldsOfStudy.length > 0) {
            params.set('fieldsOfStudy', query.fieldsOfStudy.join(','));
        }
        if (token) params.set('token', token);

        const url = `${this.baseUrl}/paper/search/bulk?${params.toString()}`;
        getLogger().debug({ url }, 'S2 bulk search');

        const response = await this.httpClient.get(url, {
            schema: SearchBulkResponseSchema,
            source: 's2',
            headers: this.buildHeaders(),
        });

        return {
            paperIds: response.data.data.map((paper) => paper.paperId),
            token: response.data.token ?? null,
        };
    }

    /**
     * Batch fetch papers by IDs, in chunks the batch endpoint accepts.
     * Unknown ids come back as null and are dropped.
     */
    async fetchPaperDetails(paperIds: string[]): Promise<RawPaper[]> {
        const logger = getLogger();
        const papers: RawPaper[] = [];

        for (let i = 0; i < paperIds.length; i += DETAILS_BATCH_SIZE) {
            const chunk = paperIds.slice(i, i + DETAILS_BATCH_SIZE);
            const url = `${this.baseUrl}/paper/batch?fields=${PAPER_DETAIL_FIELDS}`;
            logger.debug({ batchSize: chunk.length, offset: i }, 'S2 batch fetch');

            const response = await this.httpClient.post(url, { ids: chunk }, {
                schema: PaperBatchResponseSchema,
                source: 's2',
                headers: this.buildHeaders(),
            });

            for (const paper of response.data) {
                if (paper) papers.push(paper);
            }
            const missing = chunk.length - response.data.filter((p) => p !== null).length;
            if (missing > 0) {
                logger.warn({ missing }, 'S2 batch returned no record for some ids');
            }
        }

        return papers;
    }

    async fetchReferences(paperId: string): Promise<RawReference[]> {
        const logger = getLogger();
        const references: RawReference[] = [];
        let offset = 0;

        for (;;) {
            const params = new URLSearchParams({
                fields: REFERENCE_FIELDS,
                offset: String(offset),
                limit: String(Math.min(REFERENCES_PAGE_SIZE, MAX_RESULT_WINDOW - offset - 1)),
            });
            const url = `${this.baseUrl}/paper/${encodeURIComponent(paperId)}/references?${params.toString()}`;
            logger.debug({ url }, 'S2 fetch references');

            const response = await this.httpClient.get(url, {
                schema: ReferencesResponseSchema,
                source: 's2',
                headers: this.buildHeaders(),
            });

            for (const item of response.data.data) {
                references.push({ ...item, citingPaper: { paperId } });
            }

            const next = response.data.next;
            if (next === null || next === undefined || next <= offset) break;
            if (next >= MAX_RESULT_WINDOW - 1) {
                logger.warn({ paperId, window: MAX_RESULT_WINDOW }, 'Reference list truncated at the API result window');
                break;
            }
            offset = next;
        }

        return references;
    }

    async fetchAuthorAffiliations(authorIds: string[]): Promise<Map<string, string[]>> {
        const affiliations = new Map<string, string[]>();

        for (let i = 0; i < authorIds.length; i += AUTHOR_BATCH_SIZE) {
            const chunk = authorIds.slice(i, i + AUTHOR_BATCH_SIZE);
            getLogger().debug({ batchSize: chunk.length, offset: i }, 'S2 author batch fetch');

            const response = await this.httpClient.post(`${this.baseUrl}/author/batch?fields=affiliations`, { ids: chunk }, {
                schema: AuthorBatchResponseSchema,
                source: 's2',
                headers: this.buildHeaders(),
            });

            for (const author of response.data) {
                if (author?.affiliations && author.affiliations.length > 0) {
                    affiliations.set(author.authorId, author.affiliations);
                }
            }
        }

        return affiliations;
    }

    requestCount(): number {
        return this.httpClient.getRequestCount('s2');
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}
