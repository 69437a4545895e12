export const DEFAULT_MAX_DEPTH = 64;

/**
 * Why the guard refused to descend into a pointee.
 */
export type GuardVerdict = "enter" | "cycle" | "depth";

/**
 * Tracks which instances one top-level conversion has already entered, and
 * how deep it currently is on the pointer chain. Identity is by reference,
 * never by value, so each distinct node is visited at most once.
 */
export class VisitGuard {
    readonly maxDepth: number;
    #visited = new Set<object>();
    #depth = 0;

    constructor(maxDepth: number = DEFAULT_MAX_DEPTH) {
        this.maxDepth = maxDepth;
    }

    get depth(): number {
        return this.#depth;
    }

    /** Records an aggregate instance as visited. */
    mark(instance: object): void {
        this.#visited.add(instance);
    }

    visited(instance: object): boolean {
        return this.#visited.has(instance);
    }

    /**
     * Decides whether a pointee may be followed. Non-object pointees (e.g. a
     * pointer to a scalar) can't form cycles and are only depth checked.
     */
    check(pointee: unknown): GuardVerdict {
        if (typeof pointee === "object" && pointee !== null && this.#visited.has(pointee)) {
            return "cycle";
        }
        if (this.#depth >= this.maxDepth) {
            return "depth";
        }
        return "enter";
    }

    /** Runs `walk` one pointer level deeper. */
    descend<T>(walk: () => T): T {
        this.#depth++;
        try {
            return walk();
        } finally {
            this.#depth--;
        }
    }
}
