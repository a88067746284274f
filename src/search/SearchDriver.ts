import { createLogger, NAMESPACES } from '../logging.js';
import { GenerationFailed, SearchFailed, describeError } from './errors.js';
import type { TreeSearchEngine } from './TreeSearchEngine.js';
import type { CandidateOracle, SearchResult } from './types.js';

export interface SearchDriverOptions<S, C, H> {
  oracle: CandidateOracle<S, C, H>;
  /** Called once per generate(); every run gets a fresh tree. */
  createEngine: () => TreeSearchEngine<S, C, H>;
  /** Overall budget for the search; on expiry the run counts as failed. */
  deadlineMs?: number;
}

/**
 * Entry point for the narrative engine. Runs one tree search and, when it
 * yields nothing or fails, falls back to a single direct proposal.
 */
export class SearchDriver<S, C = unknown, H = unknown> {
  private readonly oracle: CandidateOracle<S, C, H>;
  private readonly createEngine: () => TreeSearchEngine<S, C, H>;
  private readonly deadlineMs?: number;
  private readonly log = createLogger(NAMESPACES.search.driver);

  constructor(options: SearchDriverOptions<S, C, H>) {
    this.oracle = options.oracle;
    this.createEngine = options.createEngine;
    this.deadlineMs = options.deadlineMs;
  }

  async generate(scriptContext: C, history: H): Promise<S> {
    let failure: SearchFailed;
    try {
      const result = await this.runSearch(scriptContext, history);
      if (result.best !== null) {
        this.log('search selected a candidate after %d iterations', result.stats.iterations);
        return result.best;
      }
      failure = new SearchFailed('no-result', 'Search produced no selectable candidate');
    } catch (error) {
      if (!(error instanceof SearchFailed)) throw error;
      failure = error;
    }

    this.log('search failed (%s): %s; falling back to a direct proposal', failure.reason, failure.message);
    return this.fallback(scriptContext, history, failure);
  }

  private async runSearch(scriptContext: C, history: H): Promise<SearchResult<S>> {
    const engine = this.createEngine();
    if (this.deadlineMs === undefined) {
      return engine.search(scriptContext, history);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.deadlineMs);
    try {
      return await engine.search(scriptContext, history, { signal: controller.signal });
    } finally {
      clearTimeout(timer);
    }
  }

  private async fallback(scriptContext: C, history: H, searchFailure: SearchFailed): Promise<S> {
    let candidates: S[];
    try {
      candidates = await this.oracle.propose(null, scriptContext, history, 1);
    } catch (error) {
      this.log('fallback proposal failed: %s', describeError(error));
      throw new GenerationFailed(`Generation unavailable: ${describeError(error)}`, {
        cause: new AggregateError([searchFailure, error], 'search and fallback both failed')
      });
    }

    const candidate = Array.isArray(candidates) ? candidates[0] : undefined;
    if (candidate === undefined || candidate === null) {
      throw new GenerationFailed('Generation unavailable: fallback proposal returned no candidate', { cause: searchFailure });
    }
    return candidate;
  }
}
