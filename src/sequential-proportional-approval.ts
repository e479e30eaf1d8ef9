import type { Ballot } from './ballots';
import { Candidate, CandidateRegistry, Node } from './candidates';

export enum SpavStatus {
    Success = 'success',
    /** seats remained but no ballot approved anyone not yet elected */
    InsufficientCandidates = 'insufficient-candidates',
}

export type SpavResult<T> = {
    status: SpavStatus.Success;
    value: T;
} | {
    status: SpavStatus.InsufficientCandidates;
    /** requested number of seats */
    seats: number;
    /** seats that were filled before the election ran out of candidates */
    filledSeats: number;
};

/** one round of the election. each round elects exactly one candidate */
export interface SpavRound {
    winner: Candidate;
    /** weighted score of every candidate still eligible in this round, in the order they were first encountered */
    scores: ReadonlyMap<Node, number>;
    /** sum of all ballot weights at the start of the round */
    weightedVotes: number;
}

export interface SpavData {
    /** in order of election */
    winners: readonly Candidate[];
    rounds: readonly SpavRound[];
    /** the ballots that were passed in, with their final weights */
    ballots: readonly Ballot[];
    /**
     * resolves the keys of `SpavRound.scores`.
     * ids are assigned by name for this run, in order of first encounter, and may differ from the ballots’ own ids
     */
    candidates: ReadonlyMap<Node, Candidate>;
}

/**
 * adds each ballot’s weight to every candidate it approves that hasn’t been elected yet.
 * candidates are resolved by name, so ballots built from different registries agree on who is who.
 * the returned map is in order of first encounter, which `findRoundWinner` relies on.
 */
function scoreBallots(ballots: readonly Ballot[], elected: ReadonlySet<Node>, registry: CandidateRegistry): Map<Node, number> {
    const scores = new Map<Node, number>();
    for (const ballot of ballots) {
        for (const candidate of ballot.approved) {
            const { id } = registry.get(candidate.name);
            if (elected.has(id)) continue;
            scores.set(id, (scores.get(id) || 0) + ballot.weight);
        }
    }
    return scores;
}

/** returns the candidate with the highest score. among equal scores, the one inserted first wins */
function findRoundWinner(scores: ReadonlyMap<Node, number>): Node | null {
    let winner: Node | null = null;
    let winnerScore = -Infinity;
    for (const [candidate, score] of scores) {
        if (score > winnerScore) {
            winner = candidate;
            winnerScore = score;
        }
    }
    return winner;
}

function totalWeight(ballots: readonly Ballot[]): number {
    let total = 0;
    for (const ballot of ballots) total += ballot.weight;
    return total;
}

/** sets each ballot’s weight to 1 / (1 + number of elected candidates it approves) */
function reweightBallots(ballots: readonly Ballot[], elected: ReadonlySet<Node>, registry: CandidateRegistry) {
    const isElected = (candidate: Candidate) => elected.has(registry.get(candidate.name).id);
    for (const ballot of ballots) {
        ballot.weight = 1 / (1 + ballot.countApproved(isElected));
    }
}

/**
 * Runs an approval election, electing one candidate per round until `seats` candidates have been elected.
 * With one seat, this is plain approval voting; with more, it is sequential proportional approval voting.
 *
 * Ballot order matters: when candidates are tied for the highest score, the winner is whichever of them was
 * encountered first while scanning the ballots (and each ballot’s approvals) in order.
 *
 * The ballots’ weights are modified in place and left as they were after the last round.
 * Ballots must start with a weight of 1 (see `resetWeights`).
 */
export function elect(ballots: readonly Ballot[], seats = 1): SpavResult<SpavData> {
    if (!Number.isInteger(seats) || seats < 0) {
        throw new RangeError(`seats must be a non-negative integer, got ${seats}`);
    }

    const winners: Candidate[] = [];
    const elected = new Set<Node>();
    const rounds: SpavRound[] = [];
    const registry = new CandidateRegistry();

    while (winners.length < seats) {
        const scores = scoreBallots(ballots, elected, registry);
        const winnerId = findRoundWinner(scores);
        const winner = winnerId === null ? undefined : registry.lookup(winnerId);
        if (!winner) {
            // nobody left to elect
            return {
                status: SpavStatus.InsufficientCandidates,
                seats,
                filledSeats: winners.length,
            };
        }

        winners.push(winner);
        elected.add(winner.id);
        rounds.push({
            winner,
            scores: new Map(scores),
            weightedVotes: totalWeight(ballots),
        });

        reweightBallots(ballots, elected, registry);
    }

    return {
        status: SpavStatus.Success,
        value: {
            winners,
            rounds,
            ballots,
            candidates: new Map(registry.candidates().map(candidate => [candidate.id, candidate])),
        },
    };
}
