import { TableBuffer } from '../io/csv.js';
import { TABLES } from '../schema/tables.js';
import type { RawPaper, RawVenue } from '../sources/schemas.js';
import { getLogger } from '../utils/logger.js';

export interface PaperProjectionStats {
    papers: number;
    duplicates: number;
    authorsWithoutId: number;
    /** Papers with no venue id, left without an IsPublishedIn edge */
    unplacedPapers: number;
}

/**
 * Buffers for every table projected from paper records.
 */
export class PaperTables {
    readonly papers = new TableBuffer(TABLES.papers);
    readonly fieldsOfStudy = new TableBuffer(TABLES.fieldsOfStudy);
    readonly authors = new TableBuffer(TABLES.authors);
    readonly organizations = new TableBuffer(TABLES.organizations);
    readonly journals = new TableBuffer(TABLES.journals);
    readonly journalVolumes = new TableBuffer(TABLES.journalVolumes);
    readonly conferences = new TableBuffer(TABLES.conferences);
    readonly workshops = new TableBuffer(TABLES.workshops);
    readonly proceedings = new TableBuffer(TABLES.proceedings);
    readonly otherVenues = new TableBuffer(TABLES.otherVenues);
    readonly hasFieldOfStudy = new TableBuffer(TABLES.hasFieldOfStudy);
    readonly wrote = new TableBuffer(TABLES.wrote);
    readonly mainAuthor = new TableBuffer(TABLES.mainAuthor);
    readonly isAffiliatedWith = new TableBuffer(TABLES.isAffiliatedWith);
    readonly isPublishedInJournal = new TableBuffer(TABLES.isPublishedInJournal);
    readonly isPublishedInProceedings = new TableBuffer(TABLES.isPublishedInProceedings);
    readonly isPublishedInOtherVenue = new TableBuffer(TABLES.isPublishedInOtherVenue);
    readonly isEditionOfJournal = new TableBuffer(TABLES.isEditionOfJournal);
    readonly isEditionOfConference = new TableBuffer(TABLES.isEditionOfConference);
    readonly isEditionOfWorkshop = new TableBuffer(TABLES.isEditionOfWorkshop);

    readonly stats: PaperProjectionStats = { papers: 0, duplicates: 0, authorsWithoutId: 0, unplacedPapers: 0 };

    /**
     * Split one paper into its node and edge rows.
     * A paper id seen before is ignored entirely: the first occurrence wins.
     */
    add(paper: RawPaper): void {
        const paperID = paper.paperId;

        const isNew = this.papers.add({
            paperID,
            url: paper.url ?? null,
            title: paper.title ?? null,
            abstract: paper.abstract ?? null,
            year: paper.year ?? null,
            isOpenAccess: paper.isOpenAccess ?? null,
            openAccessPDFUrl: paper.openAccessPdf?.url ?? null,
            publicationTypes: JSON.stringify(paper.publicationTypes ?? []),
            embedding: paper.embedding ? JSON.stringify(paper.embedding.vector) : null,
            tldr: paper.tldr?.text ?? null,
        });
        if (!isNew) {
            this.stats.duplicates++;
            return;
        }
        this.stats.papers++;

        for (const name of paper.fieldsOfStudy ?? []) {
            this.fieldsOfStudy.add({ name });
            this.hasFieldOfStudy.add({ paperID, fieldOfStudy: name });
        }

        this.addAuthors(paper);
        this.addVenue(paper);
    }

    private addAuthors(paper: RawPaper): void {
        let mainAuthorID: string | null = null;

        for (const author of paper.authors ?? []) {
            if (!author.authorId) {
                this.stats.authorsWithoutId++;
                getLogger().warn({ paperId: paper.paperId, name: author.name }, 'Skipping author without id');
                continue;
            }

            const authorID = author.authorId;
            this.authors.add({
                authorID,
                url: author.url ?? null,
                name: author.name ?? null,
                homepage: author.homepage ?? null,
                hIndex: author.hIndex ?? null,
            });
            this.wrote.add({ paperID: paper.paperId, authorID });
            mainAuthorID ??= authorID;

            for (const organization of author.affiliations ?? []) {
                this.organizations.add({ name: organization });
                this.isAffiliatedWith.add({ authorID, organization });
            }
        }

        if (mainAuthorID) {
            this.mainAuthor.add({ paperID: paper.paperId, authorID: mainAuthorID });
        }
    }

    private addVenue(paper: RawPaper): void {
        const venue = paper.publicationVenue;
        if (!venue?.id) {
            this.stats.unplacedPapers++;
            return;
        }

        const paperID = paper.paperId;
        const venueID = venue.id;
        const pages = paper.journal?.pages ?? null;
        const details = venueDetails(venue);

        switch (venue.type?.toLowerCase()) {
            case 'journal': {
                this.journals.add({ journalID: venueID, ...details });
                const volume = paper.journal?.volume?.trim() || null;
                const journalVolumeID = JSON.stringify([venueID, volume]);
                this.journalVolumes.add({ journalVolumeID, year: paper.year ?? null, volume });
                this.isEditionOfJournal.add({ journalVolumeID, journalID: venueID });
                this.isPublishedInJournal.add({ paperID, journalVolumeID, pages });
                break;
            }
            case 'conference': {
                this.conferences.add({ conferenceID: venueID, ...details });
                const proceedingsID = this.addProceedings(venueID, paper.year ?? null);
                this.isEditionOfConference.add({ proceedingsID, conferenceID: venueID });
                this.isPublishedInProceedings.add({ paperID, proceedingsID, pages });
                break;
            }
            case 'workshop': {
                this.workshops.add({ workshopID: venueID, ...details });
                const proceedingsID = this.addProceedings(venueID, paper.year ?? null);
                this.isEditionOfWorkshop.add({ proceedingsID, workshopID: venueID });
                this.isPublishedInProceedings.add({ paperID, proceedingsID, pages });
                break;
            }
            default:
                this.otherVenues.add({ venueID, ...details });
                this.isPublishedInOtherVenue.add({ paperID, venueID, pages });
        }
    }

    /**
     * Proceedings are one edition of a conference or workshop per year.
     */
    private addProceedings(venueID: string, year: number | null): string {
        const proceedingsID = JSON.stringify([venueID, year]);
        this.proceedings.add({ proceedingsID, year });
        return proceedingsID;
    }

    /**
     * All buffers, in write order.
     */
    buffers(): Array<TableBuffer<string>> {
        return [
            this.papers, this.fieldsOfStudy, this.authors, this.organizations,
            this.journals, this.journalVolumes, this.conferences, this.workshops,
            this.proceedings, this.otherVenues,
            this.hasFieldOfStudy, this.wrote, this.mainAuthor, this.isAffiliatedWith,
            this.isPublishedInJournal, this.isPublishedInProceedings, this.isPublishedInOtherVenue,
            this.isEditionOfJournal, this.isEditionOfConference, this.isEditionOfWorkshop,
        ];
    }
}

function venueDetails(venue: RawVenue): { name: string | null; url: string | null; alternateNames: string } {
    return {
        name: venue.name ?? null,
        url: venue.url ?? null,
        alternateNames: JSON.stringify(venue.alternate_names ?? []),
    };
}
