import type { Ballot } from './ballots';
import { loadBallots } from './loader';
import { formatInsufficientCandidates, formatResult } from './report';
import { elect, SpavStatus } from './sequential-proportional-approval';

export const USAGE = 'Usage: approval-election <ballot_file> [--seats N]';

export interface CliArgs {
    ballotFile?: string;
    /** number of winners */
    seats: number;
    help: boolean;
}

function parseSeats(value: string | undefined): number {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new Error(`--seats expects a non-negative integer, got ${value ?? 'nothing'}`);
    }
    return Number.parseInt(value, 10);
}

/**
 * Parses command line arguments (without the leading `node` and script path).
 * Throws on unknown flags, a bad seat count or more than one ballot file.
 */
export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { seats: 1, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '-h' || arg === '--help') {
            args.help = true;
        } else if (arg === '--seats') {
            args.seats = parseSeats(argv[++i]);
        } else if (arg.startsWith('--seats=')) {
            args.seats = parseSeats(arg.slice('--seats='.length));
        } else if (arg.startsWith('-')) {
            throw new Error(`unknown option ${arg}`);
        } else if (args.ballotFile === undefined) {
            args.ballotFile = arg;
        } else {
            throw new Error(`unexpected argument ${arg}`);
        }
    }

    return args;
}

/** Runs the command line tool and returns its exit code. */
export async function run(argv: string[]): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        console.error(USAGE);
        return 1;
    }

    if (args.help) {
        console.log(USAGE);
        return 0;
    }
    if (args.ballotFile === undefined) {
        console.error(USAGE);
        return 1;
    }

    let ballots: Ballot[];
    try {
        ballots = await loadBallots(args.ballotFile);
    } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        return 1;
    }

    const result = elect(ballots, args.seats);
    if (result.status === SpavStatus.InsufficientCandidates) {
        console.error(formatInsufficientCandidates(result.seats, result.filledSeats));
        return 1;
    }

    console.log(formatResult(result.value));
    return 0;
}
