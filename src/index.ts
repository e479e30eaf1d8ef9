export type { Node } from './candidates';
export { Candidate, CandidateRegistry } from './candidates';
export { Ballot, resetWeights, mapBallots } from './ballots';
export type { SpavResult, SpavRound, SpavData } from './sequential-proportional-approval';
export { SpavStatus, elect } from './sequential-proportional-approval';
export { BallotParseError, MAX_BALLOTS_PER_LINE, parseBallots, loadBallots } from './loader';
export { formatRound, formatResult, formatInsufficientCandidates } from './report';
