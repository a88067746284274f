import { createLogger, NAMESPACES } from '../logging.js';
import { OracleUnavailable, describeError, type OracleOperation } from '../search/errors.js';
import type { CandidateOracle } from '../search/types.js';
import { normalizeGameLog, type GameLog, type SceneDocument, type SceneEvaluation, type ScriptContext } from '../types/Scene.js';
import { mapWithConcurrency, range } from '../utils/concurrency.js';
import type { SceneCriticContext } from './SceneCriticAgent.js';
import type { SceneWriterContext } from './SceneWriterAgent.js';

/** The slice of an agent the oracle needs; lets tests hand in stubs. */
export interface Runnable<TContext, TOutput> {
  run(context: TContext): Promise<TOutput>;
}

export interface SceneOracleOptions {
  writer: Runnable<SceneWriterContext, SceneDocument>;
  critic: Runnable<SceneCriticContext, SceneEvaluation>;
  maxConcurrentProposals: number;
}

/**
 * Candidate oracle backed by the scene writer and scene critic agents.
 */
export class SceneOracle implements CandidateOracle<SceneDocument, ScriptContext, GameLog> {
  private readonly writer: Runnable<SceneWriterContext, SceneDocument>;
  private readonly critic: Runnable<SceneCriticContext, SceneEvaluation>;
  private readonly maxConcurrentProposals: number;
  private readonly log = createLogger(NAMESPACES.agents.oracle);

  constructor(options: SceneOracleOptions) {
    this.writer = options.writer;
    this.critic = options.critic;
    this.maxConcurrentProposals = options.maxConcurrentProposals;
  }

  async propose(fromState: SceneDocument | null, script: ScriptContext, history: GameLog, count: number): Promise<SceneDocument[]> {
    const context: SceneWriterContext = { script, history: normalizeGameLog(history), fromScene: fromState };
    this.log('proposing %d scene(s), at most %d at a time', count, this.maxConcurrentProposals);
    return this.guard('propose', () =>
      mapWithConcurrency(range(count), this.maxConcurrentProposals, () => this.writer.run(context))
    );
  }

  async score(state: SceneDocument, script: ScriptContext, history: GameLog): Promise<number> {
    const evaluation = await this.guard('score', () =>
      this.critic.run({ script, history: normalizeGameLog(history), candidate: state })
    );
    return evaluation.score;
  }

  private async guard<T>(operation: OracleOperation, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof OracleUnavailable) throw error;
      throw new OracleUnavailable(operation, `Scene ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
