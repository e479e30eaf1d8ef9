import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseArgs, run, USAGE } from './cli';

describe('parseArgs', () => {
    it('defaults to one seat', () => {
        expect(parseArgs(['ballots.csv'])).toEqual({ ballotFile: 'ballots.csv', seats: 1, help: false });
    });

    it('reads the seat count in either form', () => {
        expect(parseArgs(['--seats', '3', 'ballots.csv']).seats).toBe(3);
        expect(parseArgs(['ballots.csv', '--seats=0']).seats).toBe(0);
    });

    it('recognizes help', () => {
        expect(parseArgs(['-h']).help).toBe(true);
        expect(parseArgs(['--help']).help).toBe(true);
    });

    it('rejects bad input', () => {
        expect(() => parseArgs(['--seats', 'two'])).toThrow('--seats expects a non-negative integer, got two');
        expect(() => parseArgs(['--seats'])).toThrow('got nothing');
        expect(() => parseArgs(['--verbose'])).toThrow('unknown option --verbose');
        expect(() => parseArgs(['a.csv', 'b.csv'])).toThrow('unexpected argument b.csv');
    });
});

describe('run', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'approval-cli-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('prints the result of an election', async () => {
        const path = join(dir, 'ballots.csv');
        await writeFile(path, '2,A,B\n1,A\n1,B\n');

        expect(await run([path, '--seats', '2'])).toBe(0);
        const output = vi.mocked(console.log).mock.calls[0][0];
        expect(output).toContain('Seat 1: A wins\nSeat 2: B wins');
    });

    it('fails when seats cannot be filled', async () => {
        const path = join(dir, 'ballots.csv');
        await writeFile(path, '1,A\n1,B\n');

        expect(await run([path, '--seats', '3'])).toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            'Only 2 of 3 seats could be filled: no remaining ballot approves an unelected candidate.',
        );
    });

    it('reports a malformed ballot file', async () => {
        const path = join(dir, 'ballots.csv');
        await writeFile(path, '1,A\n-2,B\n');

        expect(await run([path])).toBe(1);
        expect(console.error).toHaveBeenCalledWith('line 2: ballot count cannot be negative (-2)');
        expect(console.log).not.toHaveBeenCalled();
    });

    it('reports a missing ballot file', async () => {
        const path = join(dir, 'missing.csv');

        expect(await run([path])).toBe(1);
        const message = vi.mocked(console.error).mock.calls[0][0];
        expect(message).toContain('ENOENT');
        expect(message).toContain('missing.csv');
    });

    it('prints usage for help and for a missing file argument', async () => {
        expect(await run(['--help'])).toBe(0);
        expect(console.log).toHaveBeenCalledWith(USAGE);

        expect(await run([])).toBe(1);
        expect(console.error).toHaveBeenCalledWith(USAGE);
    });
});
