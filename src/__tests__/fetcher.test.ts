import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
    fetchPapers,
    planDownload,
    RAW_PAPERS_PREFIX,
    RAW_REFERENCES_PREFIX,
    validateFetchOptions,
    type FetchOptions,
} from '../fetcher/fetcher.js';
import { listBatchFiles } from '../io/batches.js';
import { formatYearFilter, parseYearFilter } from '../fetcher/year-filter.js';
import { readJsonlLines } from '../io/jsonl.js';
import { FetchExhaustedError, ValidationError } from '../utils/errors.js';
import { createFakeSource, FakeSemanticScholar, makePaper } from './helpers/fake-semantic-scholar.js';

describe('parseYearFilter', () => {
    it('should accept a single year', () => {
        expect(parseYearFilter('2020')).toEqual({ from: 2020, to: 2020 });
    });

    it('should accept inclusive ranges, including equal ends', () => {
        expect(parseYearFilter('2018-2023')).toEqual({ from: 2018, to: 2023 });
        expect(parseYearFilter('2020-2020')).toEqual({ from: 2020, to: 2020 });
    });

    it('should accept open ranges', () => {
        expect(parseYearFilter('2019-')).toEqual({ from: 2019, to: null });
        expect(parseYearFilter('-2015')).toEqual({ from: null, to: 2015 });
    });

    it.each(['2023-2018', 'abcd', '20-21', '2018-2020-2022', '-', '', '2018 - 2020x'])('should reject "%s"', (input) => {
        expect(() => parseYearFilter(input)).toThrow(ValidationError);
    });

    it('should format back to the API syntax', () => {
        expect(formatYearFilter({ from: 2020, to: 2020 })).toBe('2020');
        expect(formatYearFilter({ from: 2018, to: 2023 })).toBe('2018-2023');
        expect(formatYearFilter({ from: 2019, to: null })).toBe('2019-');
        expect(formatYearFilter({ from: null, to: 2015 })).toBe('-2015');
    });
});

describe('validateFetchOptions', () => {
    const base = { query: 'graph databases', minCitations: 0, year: '1900-9999', limit: 10, batchSize: null, maxRetries: 3, affiliations: false };

    it('should build the search query', () => {
        expect(validateFetchOptions({ ...base, minCitations: 5, year: '2018-2023' })).toEqual({
            query: 'graph databases',
            minCitations: 5,
            year: '2018-2023',
            fieldsOfStudy: undefined,
        });
    });

    it('should list every problem at once', () => {
        try {
            validateFetchOptions({ ...base, query: '  ', limit: 0, year: '2023-2018' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                issues: [
                    'query is required',
                    'limit must be an integer >= 1 (got 0)',
                    'Invalid year filter "2023-2018": range start 2023 is after range end 2018',
                ],
            });
        }
    });
});

describe('fetchPapers', () => {
    let tmpDir: string;
    let fake: FakeSemanticScholar;

    const options = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
        query: 'graph databases',
        minCitations: 5,
        year: '2018-2023',
        limit: 50,
        batchSize: 20,
        maxRetries: 3,
        affiliations: false,
        outputDir: tmpDir,
        ...overrides,
    });

    const batchLines = (dir: string, prefix: string): string[] =>
        listBatchFiles(dir, prefix, 'jsonl').flatMap((file) => readJsonlLines(file).map((line) => line.text));

    /** Serve every search page from `page`, everything else from the fake */
    const stubSearch = (page: (call: number) => { token: string | null; ids: string[] }): void => {
        const serve = fake.fetch;
        let calls = 0;
        vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
            const url = String(input instanceof Request ? input.url : input);
            if (url.includes('/paper/search/bulk')) {
                const { token, ids } = page(++calls);
                return new Response(JSON.stringify({ total: 100, token, data: ids.map((paperId) => ({ paperId })) }), { status: 200 });
            }
            return serve(input, init);
        });
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citeload-fetch-'));
        // Pages of 25 ids force token pagination
        fake = new FakeSemanticScholar(25);
        for (let i = 1; i <= 60; i++) {
            fake.addPaper(makePaper(i), [
                { citedPaper: { paperId: `p${String(i + 1).padStart(3, '0')}` }, isInfluential: false, contextsWithIntent: [] },
            ]);
        }
        vi.stubGlobal('fetch', fake.fetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should write batches of batchSize papers with matching reference batches', async () => {
        const report = await fetchPapers(createFakeSource(), options());

        expect(report.batches.map((b) => b.papers)).toEqual([20, 20, 10]);
        expect(report.papers).toBe(50);
        expect(report.references).toBe(50);
        expect(fs.readdirSync(tmpDir).sort()).toEqual([
            'raw-papers-1.jsonl',
            'raw-papers-2.jsonl',
            'raw-papers-3.jsonl',
            'raw-references-1.jsonl',
            'raw-references-2.jsonl',
            'raw-references-3.jsonl',
        ]);
        expect(readJsonlLines(path.join(tmpDir, 'raw-papers-3.jsonl'))).toHaveLength(10);

        const firstReference = readJsonlLines(path.join(tmpDir, 'raw-references-1.jsonl'))[0];
        expect(JSON.parse(firstReference?.text ?? '')).toEqual({
            citedPaper: { paperId: 'p002' },
            isInfluential: false,
            contextsWithIntent: [],
            citingPaper: { paperId: 'p001' },
        });
    });

    it('should stop collecting ids at the limit', async () => {
        const report = await fetchPapers(createFakeSource(), options({ limit: 30, batchSize: null }));

        expect(report.batches).toHaveLength(1);
        expect(report.papers).toBe(30);
        // two search pages of 25 cover 30 ids
        expect(fake.requestCount('/paper/search/bulk')).toBe(2);
    });

    it('should write one empty batch when nothing matches', async () => {
        const report = await fetchPapers(createFakeSource(), options({ minCitations: 1000 }));

        expect(report.papers).toBe(0);
        expect(fs.readFileSync(path.join(tmpDir, 'raw-papers-1.jsonl'), 'utf-8')).toBe('');
    });

    it('should fail validation before any request', async () => {
        await expect(fetchPapers(createFakeSource(), options({ year: '2023-2018' }))).rejects.toThrow(ValidationError);
        expect(fake.requests).toHaveLength(0);
        expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('should retry transient failures', async () => {
        fake.failNext('/paper/batch', 503, 2);

        const report = await fetchPapers(createFakeSource(), options({ limit: 5, batchSize: null }));

        expect(report.papers).toBe(5);
        expect(fake.requestCount('/paper/batch')).toBe(3);
    });

    it('should keep earlier batches when retries run out', async () => {
        const source = createFakeSource(1);
        // batch 1 needs one details request; fail every later one
        const serve = fake.fetch;
        let detailCalls = 0;
        vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
            const url = String(input instanceof Request ? input.url : input);
            if (url.includes('/paper/batch') && ++detailCalls > 1) {
                return new Response('{}', { status: 500 });
            }
            return serve(input, init);
        });

        await expect(fetchPapers(source, options())).rejects.toThrow(FetchExhaustedError);

        expect(fs.readdirSync(tmpDir).sort()).toEqual(['raw-papers-1.jsonl', 'raw-references-1.jsonl']);
        expect(readJsonlLines(path.join(tmpDir, 'raw-papers-1.jsonl'))).toHaveLength(20);
    });

    it('should replace stale batches from an earlier download', async () => {
        fs.writeFileSync(path.join(tmpDir, 'raw-papers-7.jsonl'), '{}\n');

        await fetchPapers(createFakeSource(), options({ limit: 3, batchSize: null }));

        expect(fs.existsSync(path.join(tmpDir, 'raw-papers-7.jsonl'))).toBe(false);
    });

    it('should write the same records in batches as in a single batch', async () => {
        const batched = path.join(tmpDir, 'batched');
        const single = path.join(tmpDir, 'single');

        await fetchPapers(createFakeSource(), options({ batchSize: 20, outputDir: batched }));
        await fetchPapers(createFakeSource(), options({ batchSize: null, outputDir: single }));

        expect(listBatchFiles(batched, RAW_PAPERS_PREFIX, 'jsonl')).toHaveLength(3);
        expect(listBatchFiles(single, RAW_PAPERS_PREFIX, 'jsonl')).toHaveLength(1);
        for (const prefix of [RAW_PAPERS_PREFIX, RAW_REFERENCES_PREFIX]) {
            const lines = batchLines(batched, prefix);
            expect(lines).toHaveLength(50);
            expect(lines).toEqual(batchLines(single, prefix));
        }
    });

    it('should report the requests it made, retries included', async () => {
        fake.failNext('/paper/batch', 503, 1);

        const report = await fetchPapers(createFakeSource(), options({ limit: 5, batchSize: null }));

        // one search page, two detail attempts, five reference listings
        expect(report.requests).toBe(8);
        expect(fake.requests).toHaveLength(8);
    });

    it('should stop searching when a page adds no new ids', async () => {
        stubSearch(() => ({ token: 'more', ids: ['p001', 'p002', 'p003'] }));

        const report = await fetchPapers(createFakeSource(), options({ batchSize: null }));

        expect(report.papers).toBe(3);
        expect(fake.requestCount('/paper/batch')).toBe(1);
    });

    it('should stop searching when a token comes back again', async () => {
        let searches = 0;
        stubSearch((call) => {
            searches = call;
            return { token: 'same', ids: [`p${String(call).padStart(3, '0')}`] };
        });

        const report = await fetchPapers(createFakeSource(), options({ batchSize: null }));

        expect(searches).toBe(2);
        expect(report.papers).toBe(2);
    });

    it('should fill in empty author affiliations when asked', async () => {
        fake.addAuthor('a1', ['University of Tests']).addAuthor('a2', ['Lab A', 'Lab B']);

        const report = await fetchPapers(createFakeSource(), options({ limit: 1, batchSize: null, affiliations: true }));

        const paper: unknown = JSON.parse(readJsonlLines(path.join(tmpDir, 'raw-papers-1.jsonl'))[0]?.text ?? '');
        expect(paper).toMatchObject({
            paperId: 'p001',
            authors: [
                { authorId: 'a1', name: 'Author 1', affiliations: ['University of Tests'] },
                { authorId: 'a2', name: 'Author 2', affiliations: ['Lab A', 'Lab B'] },
            ],
        });
        expect(report.affiliatedAuthors).toBe(2);
        expect(fake.requestCount('/author/batch')).toBe(1);
    });

    it('should keep affiliations the paper record already has', async () => {
        fake.addPaper(
            makePaper(1, {
                authors: [
                    { authorId: 'a1', name: 'Author 1', affiliations: ['Listed Institute'] },
                    { authorId: null, name: 'Anonymous' },
                ],
            })
        );

        const report = await fetchPapers(createFakeSource(), options({ limit: 1, batchSize: null, affiliations: true }));

        expect(report.affiliatedAuthors).toBe(0);
        expect(fake.requestCount('/author/batch')).toBe(0);
    });

    it('should not look up affiliations by default', async () => {
        fake.addAuthor('a1', ['University of Tests']);

        await fetchPapers(createFakeSource(), options({ limit: 1, batchSize: null }));

        expect(fake.requestCount('/author/batch')).toBe(0);
    });
});

describe('planDownload', () => {
    let tmpDir: string;
    let fake: FakeSemanticScholar;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citeload-plan-'));
        fake = new FakeSemanticScholar(25);
        for (let i = 1; i <= 60; i++) fake.addPaper(makePaper(i));
        vi.stubGlobal('fetch', fake.fetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should search without fetching details or writing files', async () => {
        const plan = await planDownload(createFakeSource(), {
            query: 'graph databases',
            minCitations: 5,
            year: '2018-2023',
            limit: 50,
            batchSize: 20,
            maxRetries: 3,
            affiliations: false,
        });

        expect(plan).toEqual({ papers: 50, batches: 3, requests: 2 });
        expect(fake.requestCount('/paper/search/bulk')).toBe(2);
        expect(fake.requestCount('/paper/batch')).toBe(0);
        expect(fs.readdirSync(tmpDir)).toEqual([]);
    });
});
