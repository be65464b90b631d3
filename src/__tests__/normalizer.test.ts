import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { normalizeFiles, type NormalizeOptions } from '../normalizer/index.js';
import { readTable } from '../io/csv.js';
import { writeJsonl } from '../io/jsonl.js';
import { TABLES } from '../schema/tables.js';
import { MalformedRecordError } from '../utils/errors.js';
import { makePaper } from './helpers/fake-semantic-scholar.js';

describe('normalizeFiles', () => {
    let rawDir: string;
    let importDir: string;
    let options: NormalizeOptions;

    const raw = (name: string, records: unknown[]): string => {
        const file = path.join(rawDir, name);
        writeJsonl(file, records);
        return file;
    };

    beforeEach(() => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citeload-normalize-'));
        rawDir = path.join(tmpDir, 'raw');
        importDir = path.join(tmpDir, 'import');
        fs.mkdirSync(rawDir);
        options = { outputDir: importDir, batchSize: 10000, malformedRecords: 'skip' };
    });

    afterEach(() => {
        fs.rmSync(path.dirname(rawDir), { recursive: true, force: true });
    });

    describe('papers', () => {
        it('should write the paper row with derived fields', () => {
            const file = raw('raw-papers-1.jsonl', [
                makePaper(1, {
                    openAccessPdf: { url: 'https://pdf.test/1.pdf' },
                    embedding: { model: 'specter', vector: [0.1, 0.2] },
                    tldr: { model: 'tldr', text: 'Short.' },
                }),
            ]);

            normalizeFiles([file], 'papers', options);

            expect(fs.readFileSync(path.join(importDir, 'nodes-papers-1.csv'), 'utf-8')).toBe(
                'paperID,url,title,abstract,year,isOpenAccess,openAccessPDFUrl,publicationTypes,embedding,tldr\n' +
                    'p001,https://papers.test/p1,Paper 1,,2019,false,https://pdf.test/1.pdf,"[""JournalArticle""]","[0.1,0.2]",Short.\n'
            );
        });

        it('should deduplicate shared authors and venues', () => {
            // Paper 1 has authors a1, a2; paper 2 has a2, a3; both in journal volume 1
            const file = raw('raw-papers-1.jsonl', [makePaper(1), makePaper(2)]);

            const report = normalizeFiles([file], 'papers', options);

            expect(report.stats).toEqual({ papers: 2, duplicates: 0, authorsWithoutId: 0, unplacedPapers: 0 });
            expect(readTable(importDir, TABLES.authors).map((r) => r.authorID)).toEqual(['a1', 'a2', 'a3']);
            expect(readTable(importDir, TABLES.wrote)).toHaveLength(4);
            expect(readTable(importDir, TABLES.journals)).toEqual([
                { journalID: 'v-journal', name: 'Journal of Tests', url: '', alternateNames: '[]' },
            ]);
            expect(readTable(importDir, TABLES.journalVolumes)).toEqual([
                { journalVolumeID: '["v-journal","1"]', year: '2019', volume: '1' },
            ]);
            expect(readTable(importDir, TABLES.isPublishedInJournal)).toEqual([
                { paperID: 'p001', journalVolumeID: '["v-journal","1"]', pages: '1-10' },
                { paperID: 'p002', journalVolumeID: '["v-journal","1"]', pages: '1-10' },
            ]);
            expect(readTable(importDir, TABLES.fieldsOfStudy)).toEqual([{ name: 'Computer Science' }]);
            expect(readTable(importDir, TABLES.hasFieldOfStudy)).toHaveLength(2);
        });

        it('should keep the first occurrence of a paper seen in several batches', () => {
            const first = raw('raw-papers-1.jsonl', [makePaper(1, { title: 'First' })]);
            const second = raw('raw-papers-2.jsonl', [makePaper(1, { title: 'Second' }), makePaper(2)]);

            const report = normalizeFiles([first, second], 'papers', options);

            expect(report.stats['duplicates']).toBe(1);
            expect(readTable(importDir, TABLES.papers).map((r) => [r.paperID, r.title])).toEqual([
                ['p001', 'First'],
                ['p002', 'Paper 2'],
            ]);
        });

        it('should skip authors without an id and pick the first identified author as main author', () => {
            const file = raw('raw-papers-1.jsonl', [
                makePaper(1, {
                    authors: [
                        { authorId: null, name: 'Anonymous' },
                        { authorId: 'a5', name: 'Ada', affiliations: ['Test University'] },
                        { authorId: 'a6', name: 'Bob' },
                    ],
                }),
            ]);

            const report = normalizeFiles([file], 'papers', options);

            expect(report.stats['authorsWithoutId']).toBe(1);
            expect(readTable(importDir, TABLES.authors).map((r) => r.authorID)).toEqual(['a5', 'a6']);
            expect(readTable(importDir, TABLES.mainAuthor)).toEqual([{ paperID: 'p001', authorID: 'a5' }]);
            expect(readTable(importDir, TABLES.organizations)).toEqual([{ name: 'Test University' }]);
            expect(readTable(importDir, TABLES.isAffiliatedWith)).toEqual([{ authorID: 'a5', organization: 'Test University' }]);
        });

        it('should route conferences, workshops and other venues', () => {
            const file = raw('raw-papers-1.jsonl', [
                makePaper(1, { publicationVenue: { id: 'v-conf', name: 'Conf', type: 'conference' }, journal: null }),
                makePaper(2, { publicationVenue: { id: 'v-ws', name: 'Workshop', type: 'workshop' }, journal: { pages: '5-9' } }),
                makePaper(3, { publicationVenue: { id: 'v-repo', name: 'Preprints', type: 'repository' }, journal: null }),
                makePaper(4, { publicationVenue: null, journal: null }),
            ]);

            const report = normalizeFiles([file], 'papers', options);

            expect(report.stats['unplacedPapers']).toBe(1);
            expect(readTable(importDir, TABLES.proceedings)).toEqual([
                { proceedingsID: '["v-conf",2019]', year: '2019' },
                { proceedingsID: '["v-ws",2020]', year: '2020' },
            ]);
            expect(readTable(importDir, TABLES.isEditionOfConference)).toEqual([
                { proceedingsID: '["v-conf",2019]', conferenceID: 'v-conf' },
            ]);
            expect(readTable(importDir, TABLES.isEditionOfWorkshop)).toEqual([{ proceedingsID: '["v-ws",2020]', workshopID: 'v-ws' }]);
            expect(readTable(importDir, TABLES.isPublishedInProceedings)).toEqual([
                { paperID: 'p001', proceedingsID: '["v-conf",2019]', pages: '' },
                { paperID: 'p002', proceedingsID: '["v-ws",2020]', pages: '5-9' },
            ]);
            expect(readTable(importDir, TABLES.otherVenues)).toEqual([
                { venueID: 'v-repo', name: 'Preprints', url: '', alternateNames: '[]' },
            ]);
            expect(readTable(importDir, TABLES.isPublishedInOtherVenue)).toEqual([{ paperID: 'p003', venueID: 'v-repo', pages: '' }]);
            expect(readTable(importDir, TABLES.journals)).toEqual([]);
        });

        it('should split tables into batches, each with a header', () => {
            const file = raw('raw-papers-1.jsonl', [1, 2, 3, 4, 5].map((i) => makePaper(i)));

            const report = normalizeFiles([file], 'papers', { ...options, batchSize: 2 });

            const papers = report.tables.find((t) => t.prefix === 'nodes-papers');
            expect(papers?.files.map((f) => path.basename(f))).toEqual(['nodes-papers-1.csv', 'nodes-papers-2.csv', 'nodes-papers-3.csv']);
            for (const name of ['nodes-papers-1.csv', 'nodes-papers-3.csv']) {
                const [header] = fs.readFileSync(path.join(importDir, name), 'utf-8').split('\n');
                expect(header).toBe(TABLES.papers.columns.join(','));
            }
            expect(readTable(importDir, TABLES.papers)).toHaveLength(5);
        });

        it('should produce byte-identical output when run twice', () => {
            const files = [
                raw('raw-papers-1.jsonl', [makePaper(3), makePaper(1)]),
                raw('raw-papers-2.jsonl', [makePaper(2), makePaper(1)]),
            ];

            normalizeFiles(files, 'papers', options);
            const snapshot = new Map(fs.readdirSync(importDir).map((name) => [name, fs.readFileSync(path.join(importDir, name), 'utf-8')]));
            normalizeFiles(files, 'papers', options);

            expect(fs.readdirSync(importDir).sort()).toEqual([...snapshot.keys()].sort());
            for (const [name, content] of snapshot) {
                expect(fs.readFileSync(path.join(importDir, name), 'utf-8')).toBe(content);
            }
        });
    });

    describe('references', () => {
        it('should project citations, dropping unresolved ones and keeping dangling ones', () => {
            const file = raw('raw-references-1.jsonl', [
                {
                    citingPaper: { paperId: 'p001' },
                    citedPaper: { paperId: 'p002' },
                    isInfluential: true,
                    contextsWithIntent: [{ context: 'as shown in', intents: ['background'] }],
                },
                { citingPaper: { paperId: 'p001' }, citedPaper: { paperId: null }, isInfluential: false, contextsWithIntent: [] },
                { citingPaper: { paperId: 'p001' }, citedPaper: { paperId: 'outside' } },
                { citingPaper: { paperId: 'p001' }, citedPaper: { paperId: 'p002' }, isInfluential: false, contextsWithIntent: [] },
            ]);

            const report = normalizeFiles([file], 'references', options);

            expect(report.stats).toEqual({ citations: 2, duplicates: 1, unresolved: 1 });
            expect(fs.readFileSync(path.join(importDir, 'edges-citations-1.csv'), 'utf-8')).toBe(
                'citedPaperID,citingPaperID,isInfluential,contextsWithIntent\n' +
                    'outside,p001,false,[]\n' +
                    'p002,p001,true,"[{""context"":""as shown in"",""intents"":[""background""]}]"\n'
            );
        });
    });

    describe('malformed records', () => {
        const lines = (): string => {
            const file = path.join(rawDir, 'raw-papers-1.jsonl');
            fs.writeFileSync(
                file,
                [JSON.stringify(makePaper(1)), '{not json', JSON.stringify({ title: 'no id' }), JSON.stringify(makePaper(2))].join('\n') + '\n'
            );
            return file;
        };

        it('should skip and count them under the skip policy', () => {
            const report = normalizeFiles([lines()], 'papers', options);

            expect(report.records).toBe(2);
            expect(report.malformed).toBe(2);
            expect(readTable(importDir, TABLES.papers).map((r) => r.paperID)).toEqual(['p001', 'p002']);
        });

        it('should abort on the first one under the abort policy, writing nothing', () => {
            const file = lines();

            expect(() => normalizeFiles([file], 'papers', { ...options, malformedRecords: 'abort' })).toThrow(
                new MalformedRecordError(file, 2, 'invalid JSON')
            );
            expect(fs.existsSync(importDir)).toBe(false);
        });
    });
});
