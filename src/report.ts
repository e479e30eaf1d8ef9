import type { Candidate, Node } from './candidates';
import type { SpavData, SpavRound } from './sequential-proportional-approval';

const ROUND_HEADERS = ['Name', 'Approve', 'Do Not Approve', 'Percent Approve', 'Percent Do Not Approve'];
const COLUMN_GAP = '  ';

/** weighted scores are shown with at most four decimals */
function formatScore(value: number): string {
    return String(Number(value.toFixed(4)));
}

function formatPercent(value: number, total: number): string {
    // a round where every ballot weight is 0 has no meaningful share
    if (!total) return 'n/a';
    return `${(value / total * 100).toFixed(2)}%`;
}

/** lays out rows in columns. the first column is left-aligned, the others right-aligned */
function formatTable(headers: string[], rows: string[][]): string {
    const widths = headers.map((header, column) => Math.max(
        header.length,
        ...rows.map(row => row[column].length),
    ));

    const formatRow = (cells: string[]) => cells
        .map((cell, column) => column === 0 ? cell.padEnd(widths[column]) : cell.padStart(widths[column]))
        .join(COLUMN_GAP);

    return [
        formatRow(headers),
        widths.map(width => '-'.repeat(width)).join(COLUMN_GAP),
        ...rows.map(formatRow),
    ].join('\n');
}

/**
 * Renders the scores of one round as a table, highest score first.
 * Candidates with equal scores keep the order they were encountered in.
 */
export function formatRound(round: SpavRound, candidates: ReadonlyMap<Node, Candidate>): string {
    const votes = round.weightedVotes;
    const sorted = [...round.scores].sort(([, a], [, b]) => b - a);

    const rows = sorted.map(([id, score]) => {
        let name = candidates.get(id)?.name ?? String(id);
        if (id === round.winner.id) name += ' (winner)';
        return [
            name,
            formatScore(score),
            formatScore(votes - score),
            formatPercent(score, votes),
            formatPercent(votes - score, votes),
        ];
    });

    return formatTable(ROUND_HEADERS, rows);
}

/** Renders a complete election: every round, then the winner of each seat. */
export function formatResult(data: SpavData): string {
    const lines = [
        `${data.ballots.length} ballots cast`,
        'Columns represent weighted preferences.',
    ];

    data.rounds.forEach((round, i) => {
        lines.push(`Round ${i + 1}:`);
        lines.push(formatRound(round, data.candidates));
    });

    data.winners.forEach((winner, i) => {
        lines.push(`Seat ${i + 1}: ${winner.name} wins`);
    });

    return lines.join('\n');
}

/** Explains why an election could not fill its seats. */
export function formatInsufficientCandidates(seats: number, filledSeats: number): string {
    return `Only ${filledSeats} of ${seats} seats could be filled: no remaining ballot approves an unelected candidate.`;
}
