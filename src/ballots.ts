import { Candidate, CandidateRegistry } from './candidates';

/**
 * An approval ballot.
 *
 * The order of `approved` never changes a score, but it does decide ties (see `elect`).
 * `weight` starts at 1 and is overwritten in place by every round of an election, so a ballot list belongs to one
 * election run at a time; call `resetWeights` before running another election on the same list.
 */
export class Ballot {
    readonly approved: readonly Candidate[];
    weight = 1;

    constructor(approved: readonly Candidate[]) {
        this.approved = approved;
    }

    /** whether the ballot approves nobody */
    isBlank(): boolean {
        return this.approved.length === 0;
    }

    /**
     * counts the entries of the approval list that match.
     * a candidate listed twice on the ballot counts twice.
     */
    countApproved(matches: (candidate: Candidate) => boolean): number {
        let count = 0;
        for (const candidate of this.approved) {
            if (matches(candidate)) count++;
        }
        return count;
    }

    resetWeight() {
        this.weight = 1;
    }
}

/** sets every ballot’s weight back to 1 */
export function resetWeights(ballots: readonly Ballot[]) {
    for (const ballot of ballots) ballot.resetWeight();
}

/**
 * Builds ballots from plain candidate names, registering each name with the registry.
 *
 * - `ballots`: one list of approved names per ballot
 */
export function mapBallots(ballots: readonly (readonly string[])[], registry: CandidateRegistry): Ballot[] {
    return ballots.map(names => new Ballot(names.map(name => registry.get(name))));
}
