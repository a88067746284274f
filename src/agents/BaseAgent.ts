import type * as nunjucks from 'nunjucks';
import type { ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { chatCompletion } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import type { ConfigManager, JsonSchema, LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { buildJsonReturnTemplate, renderJsonReturnTemplate } from './context/jsonTemplates.js';
import { compileSchema, validateJson } from './context/jsonValidation.js';
import type { ChatMessage } from '../llm/types.js';
import type { GameLog, ScriptContext } from '../types/Scene.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(moduleDir, '..', 'prompts');
const LLM_TEMPLATES_DIR = path.join(moduleDir, '..', 'llm_templates');

export interface AgentContext {
  script: ScriptContext;
  history: Required<GameLog>;
}

/**
 * Raised when an agent cannot get a usable answer out of its LLM: the call
 * failed, or every attempt produced JSON that did not validate.
 */
export class AgentError extends Error {
  readonly agentName: string;
  readonly validationErrors: string[];

  constructor(agentName: string, message: string, options: { cause?: unknown; validationErrors?: string[] } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AgentError';
    this.agentName = agentName;
    this.validationErrors = options.validationErrors ?? [];
  }
}

/**
 * An LLM-backed agent returning validated JSON of type `TOutput`. Prompts are
 * nunjucks templates under src/prompts; chat framing comes from
 * src/llm_templates.
 */
export abstract class BaseAgent<TContext extends AgentContext, TOutput> {
  protected configManager: ConfigManager;
  protected env: nunjucks.Environment;
  protected agentName: string;
  private readonly defaultSchema: JsonSchema;
  private validator: ValidateFunction<TOutput> | null = null;
  private validatorKey: string | null = null;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, env: nunjucks.Environment, defaultSchema: JsonSchema) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = env;
    this.defaultSchema = defaultSchema;
    this.env.addFilter('json', (obj: unknown) => JSON.stringify(obj, null, 2));
  }

  abstract run(context: TContext): Promise<TOutput>;

  protected getProfile(): LLMProfile {
    // Reload config so edits apply without a restart
    this.configManager.reload();

    const config = this.configManager.getConfig();
    const agentConfig = config.agents?.[this.agentName];
    let profileName = agentConfig?.llmProfile || config.defaultProfile;
    if (profileName === 'default') {
      profileName = config.defaultProfile;
    }

    const baseProfile = this.configManager.getProfile(profileName);

    return {
      ...baseProfile,
      sampler: {
        ...baseProfile.sampler,
        ...agentConfig?.sampler
      },
      format: agentConfig?.format ?? 'json',
      ...(agentConfig?.apiKey !== undefined && { apiKey: agentConfig.apiKey }),
      ...(agentConfig?.baseURL !== undefined && { baseURL: agentConfig.baseURL }),
      ...(agentConfig?.model !== undefined && { model: agentConfig.model }),
      ...(agentConfig?.template !== undefined && { template: agentConfig.template })
    };
  }

  private getFallbackProfiles(profile: LLMProfile): LLMProfile[] {
    return (profile.fallbackProfiles || []).map(name => this.configManager.getProfile(name));
  }

  private getValidator(): ValidateFunction<TOutput> {
    const schema = this.configManager.getConfig().agents?.[this.agentName]?.jsonSchema ?? this.defaultSchema;
    const key = typeof schema === 'string' ? schema : JSON.stringify(schema);
    if (!this.validator || this.validatorKey !== key) {
      this.validator = compileSchema<TOutput>(schema);
      this.validatorKey = key;
    }
    return this.validator;
  }

  /**
   * Sends the prompt, then parses, repairs and validates the answer. Invalid
   * answers are retried up to `features.jsonValidationMaxRetries` times with
   * the validation errors appended to the prompt.
   */
  protected async callLLM(systemPrompt: string, userMessage: string): Promise<TOutput> {
    const profile = this.getProfile();
    const config = this.configManager.getConfig();
    const agentConfig = config.agents?.[this.agentName];
    const features = config.features || {};
    const maxValidationRetries = Math.max(0, features.jsonValidationMaxRetries ?? 1);
    const validator = this.getValidator();
    const promptToSend = systemPrompt + renderJsonReturnTemplate(buildJsonReturnTemplate(agentConfig, this.defaultSchema));

    let lastErrors: string[] = [];
    for (let attempt = 0; attempt <= maxValidationRetries; attempt++) {
      const promptForAttempt = attempt === 0 ? promptToSend : this.buildValidationRetryPrompt(promptToSend, lastErrors);

      let raw: string;
      try {
        raw = await this.send(profile, promptForAttempt, userMessage);
      } catch (error) {
        this.baseAgentLog('[LLM] Call failed for agent %s: %o', this.agentName, error);
        throw new AgentError(this.agentName, `LLM call failed for agent ${this.agentName}`, { cause: error });
      }

      const validation = validateJson(this.cleanResponse(raw), validator);
      if (features.jsonValidationDevLog) {
        this.baseAgentLog(
          '[JSON VALIDATION] agent=%s attempt=%d valid=%s repaired=%s payload=%s',
          this.agentName,
          attempt + 1,
          validation.valid,
          validation.repaired,
          this.truncateForLog(raw)
        );
      }
      if (validation.valid) {
        return validation.parsed;
      }
      lastErrors = validation.errors;
    }

    this.baseAgentLog('[JSON VALIDATION] agent=%s failed after %d attempts errors=%o', this.agentName, maxValidationRetries + 1, lastErrors);
    throw new AgentError(this.agentName, `Agent ${this.agentName} returned invalid JSON: ${lastErrors.join('; ')}`, {
      validationErrors: lastErrors
    });
  }

  private async send(profile: LLMProfile, systemPrompt: string, userMessage: string): Promise<string> {
    if (profile.type === 'custom') {
      this.baseAgentLog('[Agent %s] Calling custom LLM with template %s', this.agentName, profile.template);
      return customLLMRequest(profile, this.renderRawLLMTemplate(profile, systemPrompt, userMessage));
    }
    const messages = this.renderLLMTemplate(profile, systemPrompt, userMessage);
    return chatCompletion(profile, messages, { fallbackProfiles: this.getFallbackProfiles(profile) });
  }

  private buildValidationRetryPrompt(basePrompt: string, errors: string[]): string {
    const errorText = errors.length > 0 ? errors.join('; ') : 'invalid JSON output';
    return `${basePrompt}\n\n[VALIDATION RETRY]\nPrevious response had invalid JSON (${errorText}). Return valid JSON only, matching the expected schema/object. No commentary.`;
  }

  private truncateForLog(value: string): string {
    const limit = 500;
    return value.length <= limit ? value : `${value.slice(0, limit)}...`;
  }

  /** Strips code fences and thinking blocks around a JSON answer. */
  protected cleanResponse(response: string): string {
    let cleaned = response.trim();
    cleaned = cleaned.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '');
    cleaned = cleaned.replace(/<thinking>[\s\S]*?<\/thinking>/gi, '').trim();
    return cleaned;
  }

  protected renderTemplate(templateName: string, context: object): string {
    const templatePath = path.join(PROMPTS_DIR, `${templateName}.njk`);
    const template = fs.readFileSync(templatePath, 'utf-8');
    const result = this.env.renderString(template, context);
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }

  private resolveLLMTemplatePath(profile: LLMProfile): string {
    const templatePath = path.join(LLM_TEMPLATES_DIR, `${profile.template || 'chatml'}.njk`);
    if (fs.existsSync(templatePath)) {
      return templatePath;
    }
    this.baseAgentLog('WARN: Template file not found: %s. Falling back to chatml.njk', templatePath);
    return path.join(LLM_TEMPLATES_DIR, 'chatml.njk');
  }

  protected renderLLMTemplate(profile: LLMProfile, systemPrompt: string, userMessage: string): ChatMessage[] {
    const rendered = this.renderRawLLMTemplate(profile, systemPrompt, userMessage);

    const messages: ChatMessage[] = [];
    for (const part of rendered.split('<|im_start|>')) {
      if (!part.trim()) continue;
      const lines = part.split('\n');
      const roleLine = lines[0].trim();
      const content = lines.slice(1).join('\n').replace('<|im_end|>', '').trim();
      if ((roleLine === 'system' || roleLine === 'user' || roleLine === 'assistant') && content !== '') {
        messages.push({ role: roleLine, content });
      }
    }
    return messages;
  }

  /** Raw rendered template, sent as-is to custom (non-OpenAI) backends. */
  protected renderRawLLMTemplate(profile: LLMProfile, systemPrompt: string, userMessage: string): string {
    const template = fs.readFileSync(this.resolveLLMTemplatePath(profile), 'utf-8');
    return this.env.renderString(template, { system_prompt: systemPrompt, user_message: userMessage, assistant_message: '' });
  }
}
