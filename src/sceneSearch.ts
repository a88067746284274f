import * as nunjucks from 'nunjucks';
import { ConfigManager } from './configManager.js';
import { SceneCriticAgent } from './agents/SceneCriticAgent.js';
import { SceneOracle } from './agents/SceneOracle.js';
import { SceneWriterAgent } from './agents/SceneWriterAgent.js';
import { createSeededRandom, systemRandom, type RandomSource } from './search/random.js';
import { SearchDriver } from './search/SearchDriver.js';
import { TreeSearchEngine } from './search/TreeSearchEngine.js';
import type { GameLog, SceneDocument, ScriptContext } from './types/Scene.js';

export interface SceneSearchOptions {
  configManager?: ConfigManager;
  env?: nunjucks.Environment;
  /** Overrides `search.seed` from config. */
  random?: RandomSource;
}

export interface SceneSearch {
  configManager: ConfigManager;
  oracle: SceneOracle;
  driver: SearchDriver<SceneDocument, ScriptContext, GameLog>;
  generate(script: ScriptContext, history: GameLog): Promise<SceneDocument>;
}

/**
 * Wires config, prompt environment, the two agents, the oracle, the engine
 * and the driver together.
 */
export function createSceneSearch(options: SceneSearchOptions = {}): SceneSearch {
  const configManager = options.configManager ?? new ConfigManager();
  configManager.applyDebugSettings();
  const env = options.env ?? new nunjucks.Environment(null, { autoescape: false });
  const { maxConcurrentProposals, seed, deadlineMs, ...settings } = configManager.getSearchSettings();

  const oracle = new SceneOracle({
    writer: new SceneWriterAgent(configManager, env),
    critic: new SceneCriticAgent(configManager, env),
    maxConcurrentProposals
  });

  // One generator for the lifetime of this instance so consecutive runs do
  // not replay the same choices.
  const random = options.random ?? (seed !== undefined ? createSeededRandom(seed) : systemRandom);

  const driver = new SearchDriver<SceneDocument, ScriptContext, GameLog>({
    oracle,
    createEngine: () => new TreeSearchEngine(oracle, { settings, random }),
    deadlineMs
  });

  return {
    configManager,
    oracle,
    driver,
    generate: (script, history) => driver.generate(script, history)
  };
}
