export { AlphaBetaEngine, emptyStats } from './alphabeta';
export type { AlphaBetaOptions } from './alphabeta';
export { MinimaxEngine } from './minimax';
export { RolloutEvaluator } from './rollout';
export type { RolloutConfig, RolloutStats } from './rollout';
export { TranspositionTable, transpositionKey } from './transposition';
export { KillerTable } from './killers';
export { playGame, selectCandidate, createScorer } from './coordinator';
export type { PlayOptions } from './coordinator';
