/**
 * mulberry32: small, fast 32-bit PRNG. Same seed, same sequence.
 */
export function mulberry32(seed: number): () => number {
    let s = seed | 0;
    return () => {
        s = (s + 0x6d2b79f5) | 0;
        let t = Math.imul(s ^ (s >>> 15), 1 | s);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Seeded draws used by the synthesizer.
 */
export class SeededRandom {
    private readonly next: () => number;

    constructor(seed: number) {
        this.next = mulberry32(seed);
    }

    /** Uniform in [0, 1) */
    float(): number {
        return this.next();
    }

    /** Uniform integer, both ends inclusive */
    int(min: number, max: number): number {
        return Math.floor(this.next() * (max - min + 1)) + min;
    }

    pick<T>(items: readonly T[]): T {
        const item = items[Math.floor(this.next() * items.length)];
        if (item === undefined) {
            throw new RangeError('Cannot pick from an empty list');
        }
        return item;
    }

    /**
     * Draw `count` distinct items from `pool`, skipping anything in `exclude`.
     * `pool` must hold distinct items, at least `count` of them outside `exclude`.
     */
    sample<T>(pool: readonly T[], count: number, exclude: ReadonlySet<T> = new Set()): T[] {
        const chosen = new Set<T>();
        while (chosen.size < count) {
            const item = this.pick(pool);
            if (!exclude.has(item)) chosen.add(item);
        }
        return [...chosen];
    }
}
