export { SearchNode, uctValue } from './search/SearchNode.js';
export { ResultCache, defaultStateKey } from './search/ResultCache.js';
export { TreeSearchEngine, type TreeSearchEngineOptions } from './search/TreeSearchEngine.js';
export { SearchDriver, type SearchDriverOptions } from './search/SearchDriver.js';
export { createSeededRandom, systemRandom, pickOne, type RandomSource } from './search/random.js';
export { OracleUnavailable, SearchFailed, GenerationFailed } from './search/errors.js';
export {
  DEFAULT_SEARCH_SETTINGS,
  type CandidateOracle,
  type ScoreRange,
  type SearchResult,
  type SearchRunOptions,
  type SearchSettings,
  type SearchStats,
  type StateKeyFn
} from './search/types.js';
export { ConfigManager, ConfigError, type Config } from './configManager.js';
export { SceneOracle } from './agents/SceneOracle.js';
export { SceneWriterAgent } from './agents/SceneWriterAgent.js';
export { SceneCriticAgent } from './agents/SceneCriticAgent.js';
export { AgentError } from './agents/BaseAgent.js';
export { createSceneSearch, type SceneSearch, type SceneSearchOptions } from './sceneSearch.js';
export {
  normalizeGameLog,
  type EndingContent,
  type FlowLine,
  type GameLog,
  type InteractionRecord,
  type SceneContent,
  type SceneDocument,
  type SceneEvaluation,
  type SceneTrigger,
  type ScriptContext
} from './types/Scene.js';
