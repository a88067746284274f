import { createLogger, NAMESPACES } from '../logging.js';
import { OracleUnavailable, SearchFailed, describeError } from './errors.js';
import type { OracleOperation } from './errors.js';
import { pickOne, systemRandom } from './random.js';
import type { RandomSource } from './random.js';
import { ResultCache, defaultStateKey } from './ResultCache.js';
import { SearchNode } from './SearchNode.js';
import { DEFAULT_SEARCH_SETTINGS } from './types.js';
import type {
  CandidateOracle,
  SearchResult,
  SearchRunOptions,
  SearchSettings,
  SearchStats,
  StateKeyFn
} from './types.js';

export interface TreeSearchEngineOptions<S> {
  settings?: Partial<SearchSettings>;
  random?: RandomSource;
  stateKey?: StateKeyFn<S>;
}

const abortedError = () => new SearchFailed('aborted', 'Search run was aborted');

/**
 * Resolves with the oracle's result, or rejects as soon as the signal fires.
 * The oracle call itself keeps running; its result is discarded.
 */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortedError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Monte Carlo tree search over oracle-proposed candidates.
 *
 * Each run builds a fresh tree and a fresh score cache, performs up to
 * `maxIterations` select/expand/simulate/backpropagate passes strictly in
 * sequence, and returns the state of the root's best child. Oracle failures
 * end the run with `SearchFailed`; nothing is retried here.
 */
export class TreeSearchEngine<S, C = unknown, H = unknown> {
  readonly settings: SearchSettings;
  private readonly oracle: CandidateOracle<S, C, H>;
  private readonly random: RandomSource;
  private readonly stateKey: StateKeyFn<S>;
  private readonly log = createLogger(NAMESPACES.search.engine);

  constructor(oracle: CandidateOracle<S, C, H>, options: TreeSearchEngineOptions<S> = {}) {
    this.oracle = oracle;
    this.settings = {
      ...DEFAULT_SEARCH_SETTINGS,
      ...options.settings,
      scoreRange: { ...DEFAULT_SEARCH_SETTINGS.scoreRange, ...options.settings?.scoreRange }
    };
    this.random = options.random ?? systemRandom;
    this.stateKey = options.stateKey ?? defaultStateKey;
  }

  async search(scriptContext: C, history: H, options: SearchRunOptions = {}): Promise<SearchResult<S>> {
    const { signal } = options;
    const { maxIterations, maxDepth, explorationWeight } = this.settings;
    const root = new SearchNode<S>(null, null, explorationWeight);
    const cache = new ResultCache();
    const stats: SearchStats = {
      iterations: 0,
      depthGuardedIterations: 0,
      expansions: 0,
      proposeCalls: 0,
      scoreCalls: 0,
      cacheHits: 0,
      modelCalls: 0,
      nodeCount: 1,
      rootVisits: 0
    };

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (signal?.aborted) throw abortedError();
      stats.iterations = iteration;

      let node = this.select(root);

      const depth = node.depth();
      if (depth >= maxDepth) {
        stats.depthGuardedIterations += 1;
        this.log('iteration %d/%d depth-guarded at depth %d', iteration, maxIterations, depth);
        continue;
      }

      if (node.visitCount > 0 && !node.isExpanded) {
        const candidates = await this.propose(node, scriptContext, history, signal, stats);
        const children = node.expand(candidates);
        stats.expansions += 1;
        this.log('expanded node at depth %d with %d candidates', depth, children.length);
        if (children.length > 0) {
          node = pickOne(this.random, children);
        }
      }

      const score = await this.simulate(node, cache, scriptContext, history, signal, stats);

      for (const ancestor of node.pathToRoot()) {
        ancestor.update(score);
      }

      this.log('iteration %d/%d model calls %d', iteration, maxIterations, stats.modelCalls);
    }

    const bestNode = root.selectBestChild(explorationWeight);
    stats.nodeCount = root.countNodes();
    stats.rootVisits = root.visitCount;
    this.log('search finished: %o', stats);

    return { best: bestNode ? bestNode.state : null, stats, root };
  }

  /**
   * Descends from the root. Stops at a leaf, or at an unvisited child picked
   * uniformly at random among its unvisited siblings.
   */
  private select(root: SearchNode<S>): SearchNode<S> {
    let node = root;
    while (!node.isLeaf) {
      const unvisited = node.children.filter((child) => child.visitCount === 0);
      if (unvisited.length > 0) {
        return pickOne(this.random, unvisited);
      }
      const best = node.selectBestChild(this.settings.explorationWeight);
      if (!best) break;
      node = best;
    }
    return node;
  }

  private async propose(
    node: SearchNode<S>,
    scriptContext: C,
    history: H,
    signal: AbortSignal | undefined,
    stats: SearchStats
  ): Promise<S[]> {
    const { candidatesPerExpansion } = this.settings;
    stats.proposeCalls += 1;
    const candidates = await this.callOracle('propose', signal, () =>
      this.oracle.propose(node.state, scriptContext, history, candidatesPerExpansion)
    );
    if (!Array.isArray(candidates)) {
      throw this.oracleFailure(new OracleUnavailable('propose', 'Oracle proposal is not a list'));
    }
    if (candidates.some((candidate) => candidate === null || candidate === undefined)) {
      throw this.oracleFailure(new OracleUnavailable('propose', 'Oracle proposal contains an empty candidate'));
    }
    stats.modelCalls += candidates.length;
    return candidates;
  }

  private async simulate(
    node: SearchNode<S>,
    cache: ResultCache,
    scriptContext: C,
    history: H,
    signal: AbortSignal | undefined,
    stats: SearchStats
  ): Promise<number> {
    const state = node.state;
    if (state === null) return 0;

    let key: string;
    try {
      key = this.stateKey(state);
    } catch (error) {
      this.log('state key failed: %s', describeError(error));
      throw new SearchFailed('state-key', `Cannot compute a cache key: ${describeError(error)}`, { cause: error });
    }
    const cached = cache.get(key);
    if (cached !== undefined) {
      stats.cacheHits += 1;
      return cached;
    }

    stats.scoreCalls += 1;
    stats.modelCalls += 1;
    const score = await this.callOracle('score', signal, () => this.oracle.score(state, scriptContext, history));
    const { min, max } = this.settings.scoreRange;
    if (typeof score !== 'number' || !Number.isFinite(score) || score < min || score > max) {
      throw this.oracleFailure(new OracleUnavailable('score', `Oracle score ${String(score)} is outside ${min}..${max}`));
    }
    cache.put(key, score);
    return score;
  }

  private async callOracle<T>(operation: OracleOperation, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    try {
      return await raceAbort(call(), signal);
    } catch (error) {
      if (error instanceof SearchFailed) throw error;
      const unavailable = error instanceof OracleUnavailable
        ? error
        : new OracleUnavailable(operation, `Oracle ${operation} failed: ${describeError(error)}`, { cause: error });
      throw this.oracleFailure(unavailable);
    }
  }

  private oracleFailure(error: OracleUnavailable): SearchFailed {
    this.log('oracle %s failed: %s', error.operation, error.message);
    return new SearchFailed('oracle', `Search aborted: ${error.message}`, { cause: error });
  }
}
