import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { Ballot } from './ballots';
import { CandidateRegistry } from './candidates';

/** a ballot file line that could not be turned into ballots */
export class BallotParseError extends Error {
    constructor(readonly line: number, message: string, options?: { cause?: unknown }) {
        super(`line ${line}: ${message}`, options);
        this.name = 'BallotParseError';
    }
}

const COUNT_PATTERN = /^[+-]?\d+$/;

/** largest count a single line may expand to */
export const MAX_BALLOTS_PER_LINE = 1_000_000;

/** removes a trailing `#` comment and surrounding whitespace */
function stripComment(line: string): string {
    const commentStart = line.indexOf('#');
    if (commentStart !== -1) line = line.slice(0, commentStart);
    return line.trim();
}

/** splits one line into its comma-separated fields */
function parseFields(text: string, lineNumber: number): string[] {
    let records: unknown;
    try {
        records = parse(text, { trim: true, relax_column_count: true });
    } catch (err) {
        throw new BallotParseError(lineNumber, err instanceof Error ? err.message : String(err), { cause: err });
    }

    if (!Array.isArray(records) || records.length !== 1) {
        throw new BallotParseError(lineNumber, 'expected exactly one row');
    }
    const [record] = records;
    if (!Array.isArray(record)) throw new BallotParseError(lineNumber, 'expected a row of fields');

    const fields: string[] = [];
    for (const field of record) {
        if (typeof field !== 'string') throw new BallotParseError(lineNumber, 'expected text fields');
        fields.push(field);
    }
    return fields;
}

/**
 * Parses ballots from text.
 *
 * Each line reads `count,name1,name2,…` and stands for `count` ballots approving exactly those candidates.
 * If the first field is not an integer, the line is a single ballot and the first field is a candidate name too.
 * Anything after a `#` is a comment; lines that are blank once comments are removed are skipped.
 * Fields may be quoted as in CSV.
 *
 * Ballots are returned in file order, which is the order an election breaks ties in.
 * Throws a `BallotParseError` for the first bad line; no ballots are returned in that case.
 * A count of 0 yields no ballots. Negative counts are rejected rather than read as 0, and so are counts above
 * `MAX_BALLOTS_PER_LINE`.
 */
export function parseBallots(source: string, registry = new CandidateRegistry()): Ballot[] {
    const ballots: Ballot[] = [];
    const lines = source.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const lineNumber = i + 1;
        const text = stripComment(lines[i]);
        if (!text) continue;

        const fields = parseFields(text, lineNumber);
        let count = 1;
        let names = fields;
        if (COUNT_PATTERN.test(fields[0])) {
            count = Number.parseInt(fields[0], 10);
            names = fields.slice(1);
        }
        if (count < 0) {
            throw new BallotParseError(lineNumber, `ballot count cannot be negative (${fields[0]})`);
        }
        if (count > MAX_BALLOTS_PER_LINE) {
            throw new BallotParseError(lineNumber, `ballot count ${fields[0]} exceeds ${MAX_BALLOTS_PER_LINE}`);
        }

        const approved = names
            .filter(name => name.length > 0)
            .map(name => registry.get(name));
        for (let j = 0; j < count; j++) {
            ballots.push(new Ballot(approved));
        }
    }

    return ballots;
}

/** reads and parses a ballot file. see `parseBallots` */
export async function loadBallots(path: string, registry = new CandidateRegistry()): Promise<Ballot[]> {
    const source = await readFile(path, 'utf-8');
    return parseBallots(source, registry);
}
