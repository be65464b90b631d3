import { TableBuffer } from '../io/csv.js';
import { TABLES } from '../schema/tables.js';
import type { RawReference } from '../sources/schemas.js';

export interface ReferenceProjectionStats {
    citations: number;
    duplicates: number;
    /** References whose cited paper has no id */
    unresolved: number;
}

/**
 * Citation edges projected from reference records. A cited paper that is not
 * in the paper table is kept; the load script skips it.
 */
export class ReferenceTables {
    readonly citations = new TableBuffer(TABLES.citations);

    readonly stats: ReferenceProjectionStats = { citations: 0, duplicates: 0, unresolved: 0 };

    add(reference: RawReference): void {
        const citedPaperID = reference.citedPaper.paperId;
        if (!citedPaperID) {
            this.stats.unresolved++;
            return;
        }

        const isNew = this.citations.add({
            citedPaperID,
            citingPaperID: reference.citingPaper.paperId,
            isInfluential: reference.isInfluential ?? false,
            contextsWithIntent: JSON.stringify(reference.contextsWithIntent ?? []),
        });

        if (isNew) this.stats.citations++;
        else this.stats.duplicates++;
    }

    buffers(): Array<TableBuffer<string>> {
        return [this.citations];
    }
}
