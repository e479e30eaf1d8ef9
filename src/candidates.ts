/** numeric candidate id, as handed out by a `CandidateRegistry` */
export type Node = number;

/** a candidate. identity is the name; the id is only meaningful within the registry that created it. */
export class Candidate {
    constructor(readonly id: Node, readonly name: string) {}

    equals(other: Candidate): boolean {
        return this.name === other.name;
    }

    toString(): string {
        return this.name;
    }
}

/**
 * Hands out one `Candidate` per distinct name, with ids 1, 2, 3, … in order of first registration.
 *
 * Build one registry per set of ballots and look every name up through it, so that two ballots naming the same
 * candidate share a single id.
 */
export class CandidateRegistry {
    #byName = new Map<string, Candidate>();
    #byId = new Map<Node, Candidate>();

    /** returns the candidate with this name, registering it if it has not been seen */
    get(name: string): Candidate {
        const existing = this.#byName.get(name);
        if (existing) return existing;

        const candidate = new Candidate(this.#byName.size + 1, name);
        this.#byName.set(name, candidate);
        this.#byId.set(candidate.id, candidate);
        return candidate;
    }

    has(name: string): boolean {
        return this.#byName.has(name);
    }

    /** looks up a candidate by id */
    lookup(id: Node): Candidate | undefined {
        return this.#byId.get(id);
    }

    get size(): number {
        return this.#byName.size;
    }

    /** all candidates, in registration order */
    candidates(): Candidate[] {
        return [...this.#byName.values()];
    }
}
