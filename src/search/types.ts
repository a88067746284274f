import type { SearchNode } from './SearchNode.js';

/**
 * The two capabilities the search consumes. Both are asynchronous and may be
 * slow or fail; neither is assumed deterministic.
 */
export interface CandidateOracle<S, C = unknown, H = unknown> {
  /**
   * Propose continuations of `fromState` (null when proposing from scratch).
   * `count` is how many candidates the caller wants. May resolve to an empty
   * array; must not contain null entries.
   */
  propose(fromState: S | null, scriptContext: C, history: H, count: number): Promise<S[]>;
  /** Quality score for a candidate, inside the engine's score range. */
  score(state: S, scriptContext: C, history: H): Promise<number>;
}

/** Canonical cache key for a candidate state. */
export type StateKeyFn<S> = (state: S) => string;

export interface ScoreRange {
  min: number;
  max: number;
}

export interface SearchSettings {
  maxIterations: number;
  maxDepth: number;
  explorationWeight: number;
  candidatesPerExpansion: number;
  scoreRange: ScoreRange;
}

export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  maxIterations: 5,
  maxDepth: 3,
  explorationWeight: 1.41,
  candidatesPerExpansion: 2,
  scoreRange: { min: 0, max: 5 }
};

export interface SearchStats {
  iterations: number;
  depthGuardedIterations: number;
  expansions: number;
  proposeCalls: number;
  scoreCalls: number;
  cacheHits: number;
  /** Candidates proposed plus scores requested. */
  modelCalls: number;
  nodeCount: number;
  rootVisits: number;
}

export interface SearchResult<S> {
  best: S | null;
  stats: SearchStats;
  /** The finished tree, for inspection. */
  root: SearchNode<S>;
}

export interface SearchRunOptions {
  signal?: AbortSignal;
}
