import type * as nunjucks from 'nunjucks';
import { BaseAgent, type AgentContext } from './BaseAgent.js';
import type { ConfigManager } from '../configManager.js';
import { SCENE_DOCUMENT_SCHEMA } from './context/schemas.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { SceneDocument } from '../types/Scene.js';

export interface SceneWriterContext extends AgentContext {
  /** Scene to build on; absent when writing from the script alone. */
  fromScene?: SceneDocument | null;
}

export class SceneWriterAgent extends BaseAgent<SceneWriterContext, SceneDocument> {
  private readonly log = createLogger(NAMESPACES.agents.writer);

  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('sceneWriter', configManager, env, SCENE_DOCUMENT_SCHEMA);
  }

  async run(context: SceneWriterContext): Promise<SceneDocument> {
    const systemPrompt = this.renderTemplate('scene-writer', context);
    const scene = await this.callLLM(systemPrompt, 'Write the next scene now.');
    this.log('wrote scene(s): %s', Object.keys(scene).join(', '));
    return scene;
  }
}
