import type { RawPaper, RawReference } from '../sources/schemas.js';

/**
 * Filters for a bulk paper search.
 */
export interface PaperSearchQuery {
    query: string;
    minCitations?: number;
    /** Year filter in the API's own syntax (`2019`, `2016-2020`, `2010-`, `-2015`) */
    year?: string;
    fieldsOfStudy?: string[];
}

/**
 * One page of search results.
 */
export interface SearchPage {
    paperIds: string[];
    /** Continuation token; null when the result set is exhausted */
    token: string | null;
}

/**
 * Interface for paper-metadata sources.
 * The fetcher pages, batches and caps; a source only speaks to its API.
 */
export interface ScholarlySource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Fetch one page of paper ids matching the query.
     * @param token - Continuation token from the previous page
     */
    searchPage(query: PaperSearchQuery, token?: string): Promise<SearchPage>;

    /**
     * Fetch full paper records. Ids the API does not know are left out.
     */
    fetchPaperDetails(paperIds: string[]): Promise<RawPaper[]>;

    /**
     * Fetch the outgoing references of a paper, tagged with the citing id.
     */
    fetchReferences(paperId: string): Promise<RawReference[]>;

    /**
     * Look up author affiliations by author id. Authors the API does not
     * know, or knows no affiliation for, are left out.
     */
    fetchAuthorAffiliations(authorIds: string[]): Promise<Map<string, string[]>>;

    /**
     * HTTP requests made so far, retries included.
     */
    requestCount(): number;
}

/**
 * Options for source initialization.
 */
export interface SourceOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Base URL override, e.g. for a mirror */
    baseUrl?: string;
}
