#!/usr/bin/env node
/**
 * approval-election: runs an approval or SPAV election from a ballot file.
 *
 * Usage:
 *   approval-election ballots.csv [--seats 3]
 */
import { run } from '../cli';

run(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
    });
