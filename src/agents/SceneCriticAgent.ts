import type * as nunjucks from 'nunjucks';
import { BaseAgent, type AgentContext } from './BaseAgent.js';
import type { ConfigManager } from '../configManager.js';
import { SCENE_EVALUATION_SCHEMA } from './context/schemas.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { SceneDocument, SceneEvaluation } from '../types/Scene.js';

export interface SceneCriticContext extends AgentContext {
  candidate: SceneDocument;
}

export class SceneCriticAgent extends BaseAgent<SceneCriticContext, SceneEvaluation> {
  private readonly log = createLogger(NAMESPACES.agents.critic);

  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('sceneCritic', configManager, env, SCENE_EVALUATION_SCHEMA);
  }

  async run(context: SceneCriticContext): Promise<SceneEvaluation> {
    const systemPrompt = this.renderTemplate('scene-critic', context);
    const evaluation = await this.callLLM(systemPrompt, 'Score the new scene now.');
    this.log('score %d: %s', evaluation.score, evaluation.reason);
    return evaluation;
  }
}
