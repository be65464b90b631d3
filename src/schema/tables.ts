/**
 * CSV table contract shared by the normalizer, the synthesizer and the
 * bulk-load script (`cypher/load_data.cyp`).
 *
 * Column names are binding: the load script reads them as `row.<column>`.
 * Bump SCHEMA_VERSION whenever a column is added, renamed or removed, together
 * with the `schema-version` header of the load script.
 */
export const SCHEMA_VERSION = 1;

export type CsvValue = string | number | boolean | null;

export type TableKind = 'node' | 'edge';

/** The stage that owns (and alone writes) a table */
export type TableOwner = 'normalize' | 'synthesize';

export interface TableDefinition<C extends string = string> {
    /** File prefix; batches are `<prefix>-<n>.csv` */
    readonly prefix: string;
    readonly kind: TableKind;
    readonly owner: TableOwner;
    readonly columns: readonly C[];
    /** Natural key: rows are unique and sorted by these columns */
    readonly key: readonly C[];
}

function defineTable<C extends string>(definition: TableDefinition<C>): TableDefinition<C> {
    return definition;
}

export const TABLES = {
    // ─── Nodes ────────────────────────────────────────────
    papers: defineTable({
        prefix: 'nodes-papers', kind: 'node', owner: 'normalize',
        columns: ['paperID', 'url', 'title', 'abstract', 'year', 'isOpenAccess', 'openAccessPDFUrl', 'publicationTypes', 'embedding', 'tldr'],
        key: ['paperID'],
    }),
    fieldsOfStudy: defineTable({
        prefix: 'nodes-fieldsofstudy', kind: 'node', owner: 'normalize',
        columns: ['name'],
        key: ['name'],
    }),
    authors: defineTable({
        prefix: 'nodes-authors', kind: 'node', owner: 'normalize',
        columns: ['authorID', 'url', 'name', 'homepage', 'hIndex'],
        key: ['authorID'],
    }),
    organizations: defineTable({
        prefix: 'nodes-organizations', kind: 'node', owner: 'normalize',
        columns: ['name'],
        key: ['name'],
    }),
    journals: defineTable({
        prefix: 'nodes-journals', kind: 'node', owner: 'normalize',
        columns: ['journalID', 'name', 'url', 'alternateNames'],
        key: ['journalID'],
    }),
    journalVolumes: defineTable({
        prefix: 'nodes-journalvolumes', kind: 'node', owner: 'normalize',
        columns: ['journalVolumeID', 'year', 'volume'],
        key: ['journalVolumeID'],
    }),
    conferences: defineTable({
        prefix: 'nodes-conferences', kind: 'node', owner: 'normalize',
        columns: ['conferenceID', 'name', 'url', 'alternateNames'],
        key: ['conferenceID'],
    }),
    workshops: defineTable({
        prefix: 'nodes-workshops', kind: 'node', owner: 'normalize',
        columns: ['workshopID', 'name', 'url', 'alternateNames'],
        key: ['workshopID'],
    }),
    proceedings: defineTable({
        prefix: 'nodes-proceedings', kind: 'node', owner: 'normalize',
        columns: ['proceedingsID', 'year'],
        key: ['proceedingsID'],
    }),
    otherVenues: defineTable({
        prefix: 'nodes-othervenues', kind: 'node', owner: 'normalize',
        columns: ['venueID', 'name', 'url', 'alternateNames'],
        key: ['venueID'],
    }),
    cities: defineTable({
        prefix: 'nodes-cities', kind: 'node', owner: 'synthesize',
        columns: ['name'],
        key: ['name'],
    }),
    keywords: defineTable({
        prefix: 'nodes-keywords', kind: 'node', owner: 'synthesize',
        columns: ['name'],
        key: ['name'],
    }),

    // ─── Edges ────────────────────────────────────────────
    citations: defineTable({
        prefix: 'edges-citations', kind: 'edge', owner: 'normalize',
        columns: ['citedPaperID', 'citingPaperID', 'isInfluential', 'contextsWithIntent'],
        key: ['citingPaperID', 'citedPaperID'],
    }),
    hasFieldOfStudy: defineTable({
        prefix: 'edges-hasfieldofstudy', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'fieldOfStudy'],
        key: ['paperID', 'fieldOfStudy'],
    }),
    wrote: defineTable({
        prefix: 'edges-wrote', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'authorID'],
        key: ['paperID', 'authorID'],
    }),
    mainAuthor: defineTable({
        prefix: 'edges-mainauthor', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'authorID'],
        key: ['paperID', 'authorID'],
    }),
    isAffiliatedWith: defineTable({
        prefix: 'edges-isaffiliatedwith', kind: 'edge', owner: 'normalize',
        columns: ['authorID', 'organization'],
        key: ['authorID', 'organization'],
    }),
    isPublishedInJournal: defineTable({
        prefix: 'edges-ispublishedinjournal', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'journalVolumeID', 'pages'],
        key: ['paperID', 'journalVolumeID'],
    }),
    isPublishedInProceedings: defineTable({
        prefix: 'edges-ispublishedinproceedings', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'proceedingsID', 'pages'],
        key: ['paperID', 'proceedingsID'],
    }),
    isPublishedInOtherVenue: defineTable({
        prefix: 'edges-ispublishedinothervenue', kind: 'edge', owner: 'normalize',
        columns: ['paperID', 'venueID', 'pages'],
        key: ['paperID', 'venueID'],
    }),
    isEditionOfJournal: defineTable({
        prefix: 'edges-iseditionofjournal', kind: 'edge', owner: 'normalize',
        columns: ['journalVolumeID', 'journalID'],
        key: ['journalVolumeID', 'journalID'],
    }),
    isEditionOfConference: defineTable({
        prefix: 'edges-iseditionofconference', kind: 'edge', owner: 'normalize',
        columns: ['proceedingsID', 'conferenceID'],
        key: ['proceedingsID', 'conferenceID'],
    }),
    isEditionOfWorkshop: defineTable({
        prefix: 'edges-iseditionofworkshop', kind: 'edge', owner: 'normalize',
        columns: ['proceedingsID', 'workshopID'],
        key: ['proceedingsID', 'workshopID'],
    }),
    isHeldIn: defineTable({
        prefix: 'edges-isheldin', kind: 'edge', owner: 'synthesize',
        columns: ['proceedingsID', 'city'],
        key: ['proceedingsID', 'city'],
    }),
    reviewed: defineTable({
        prefix: 'edges-reviewed', kind: 'edge', owner: 'synthesize',
        columns: ['paperID', 'authorID', 'accepted', 'minorRevisions', 'majorRevisions', 'reviewContent'],
        key: ['paperID', 'authorID'],
    }),
    hasKeyword: defineTable({
        prefix: 'edges-haskeyword', kind: 'edge', owner: 'synthesize',
        columns: ['paperID', 'keyword'],
        key: ['paperID', 'keyword'],
    }),
};

export type TableName = keyof typeof TABLES;

/**
 * Find a table definition by its file prefix.
 */
export function tableByPrefix(prefix: string): TableDefinition | undefined {
    return Object.values(TABLES).find((table) => table.prefix === prefix);
}
