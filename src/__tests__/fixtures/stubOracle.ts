import { vi, type Mock } from 'vitest';
import type { CandidateOracle } from '../../search/types.js';

export interface StubScript {
  title: string;
}

export interface StubHistory {
  plot: string[];
}

type ProposeFn = CandidateOracle<string, StubScript, StubHistory>['propose'];
type ScoreFn = CandidateOracle<string, StubScript, StubHistory>['score'];

export interface StubOracle extends CandidateOracle<string, StubScript, StubHistory> {
  propose: Mock<ProposeFn>;
  score: Mock<ScoreFn>;
}

export const script: StubScript = { title: 'The Bakery Affair' };
export const history: StubHistory = { plot: ['The baker is missing'] };

/** Every proposal yields `proposals`; scores come from `scores` (unknown states score 0). */
export function createStubOracle(proposals: string[], scores: Record<string, number>): StubOracle {
  return {
    propose: vi.fn<ProposeFn>(async () => [...proposals]),
    score: vi.fn<ScoreFn>(async (state) => scores[state] ?? 0)
  };
}
