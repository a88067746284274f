import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import Ajv from 'ajv';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
import { DEFAULT_SEARCH_SETTINGS, type SearchSettings } from './search/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger(NAMESPACES.config);

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  maxContextTokens?: number; // Maximum total context length in tokens
  forceJson?: boolean;
  n?: number;
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses the OpenAI SDK, 'custom' posts raw prompts with axios
  apiKey?: string;
  baseURL: string;
  model?: string;
  template?: string;
  sampler?: SamplerSettings;
  format?: 'json' | 'text';
  fallbackProfiles?: string[]; // Profile names to try if this one fails
}

export type JsonSchema = Record<string, unknown>;

export interface AgentConfig {
  llmProfile?: string;
  sampler?: SamplerSettings;
  format?: 'json' | 'text';
  apiKey?: string;
  baseURL?: string;
  model?: string;
  template?: string;
  jsonMode?: 'object' | 'schema';
  jsonSchema?: string | JsonSchema; // inline schema when jsonMode === 'schema'
  jsonExample?: Record<string, unknown>;
}

export interface SearchConfig extends Partial<Omit<SearchSettings, 'scoreRange'>> {
  scoreRange?: Partial<SearchSettings['scoreRange']>;
  maxConcurrentProposals?: number;
  seed?: number;
  deadlineMs?: number;
}

export interface ResolvedSearchConfig extends SearchSettings {
  maxConcurrentProposals: number;
  seed?: number;
  deadlineMs?: number;
}

export interface Config {
  profiles: Record<string, LLMProfile>;
  defaultProfile: string;
  agents?: Record<string, AgentConfig>;
  features?: {
    jsonValidationDevLog?: boolean;
    jsonValidationMaxRetries?: number;
  };
  search?: SearchConfig;
  debug?: DebugSettings;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_MAX_CONCURRENT_PROPOSALS = 2;

export function defaultConfigPath(): string {
  return process.env.PLOTSEARCH_CONFIG || path.join(__dirname, '..', 'localConfig', 'config.json');
}

export function createDefaultConfig(): Config {
  return {
    defaultProfile: 'openai',
    profiles: {
      openai: {
        type: 'openai',
        apiKey: 'dummy-key',
        baseURL: 'https://api.openai.com/v1',
        model: 'gpt-4o-mini',
        template: 'chatml'
      }
    },
    features: {
      jsonValidationMaxRetries: 1
    },
    search: {},
    debug: {
      enabledNamespaces: 'plotsearch:search:*'
    }
  };
}

const ajv = new Ajv({ allErrors: true, strict: false });

const validateConfigShape = ajv.compile<Config>({
  type: 'object',
  required: ['profiles', 'defaultProfile'],
  properties: {
    defaultProfile: { type: 'string' },
    profiles: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['type', 'baseURL'],
        properties: {
          type: { enum: ['openai', 'custom'] },
          baseURL: { type: 'string' },
          fallbackProfiles: { type: 'array', items: { type: 'string' } }
        }
      }
    },
    agents: { type: 'object', additionalProperties: { type: 'object' } },
    features: { type: 'object' },
    search: { type: 'object' },
    debug: { type: 'object' }
  }
});

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`search.${name} must be an integer >= ${min}, got ${String(value)}`);
  }
  return value;
}

function requireFinite(name: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`search.${name} must be a finite number, got ${String(value)}`);
  }
  return value;
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = defaultConfigPath()) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      log('No config at %s, using built-in defaults', configPath);
      return createDefaultConfig();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid config at ${configPath}: ${reason}`);
    }
    if (!validateConfigShape(parsed)) {
      const errors = (validateConfigShape.errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
      throw new ConfigError(`Invalid config at ${configPath}: ${errors.join('; ')}`);
    }
    this.validateAgentConfigs(parsed.agents || {});
    return parsed;
  }

  private validateAgentConfigs(agents: Record<string, AgentConfig>): void {
    for (const [name, cfg] of Object.entries(agents)) {
      if (!cfg) continue;
      if (cfg.jsonMode === 'schema' && !cfg.jsonSchema) {
        log('Agent %s expects schema mode but no jsonSchema provided; the built-in schema applies', name);
      }
    }
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new ConfigError(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getDefaultProfile(): LLMProfile {
    return this.getProfile();
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }

  /** Search settings merged over the defaults, validated. */
  getSearchSettings(): ResolvedSearchConfig {
    const search = this.config.search || {};
    const scoreRange = { ...DEFAULT_SEARCH_SETTINGS.scoreRange, ...search.scoreRange };

    const resolved: ResolvedSearchConfig = {
      maxIterations: requireInteger('maxIterations', search.maxIterations ?? DEFAULT_SEARCH_SETTINGS.maxIterations, 0),
      maxDepth: requireInteger('maxDepth', search.maxDepth ?? DEFAULT_SEARCH_SETTINGS.maxDepth, 0),
      explorationWeight: requireFinite('explorationWeight', search.explorationWeight ?? DEFAULT_SEARCH_SETTINGS.explorationWeight),
      candidatesPerExpansion: requireInteger('candidatesPerExpansion', search.candidatesPerExpansion ?? DEFAULT_SEARCH_SETTINGS.candidatesPerExpansion, 1),
      scoreRange: {
        min: requireFinite('scoreRange.min', scoreRange.min),
        max: requireFinite('scoreRange.max', scoreRange.max)
      },
      maxConcurrentProposals: requireInteger('maxConcurrentProposals', search.maxConcurrentProposals ?? DEFAULT_MAX_CONCURRENT_PROPOSALS, 1)
    };
    if (resolved.scoreRange.min > resolved.scoreRange.max) {
      throw new ConfigError(`search.scoreRange is empty: ${resolved.scoreRange.min} > ${resolved.scoreRange.max}`);
    }
    if (search.seed !== undefined) {
      resolved.seed = requireInteger('seed', search.seed, 0);
    }
    if (search.deadlineMs !== undefined) {
      resolved.deadlineMs = requireInteger('deadlineMs', search.deadlineMs, 1);
    }
    return resolved;
  }

  /** Turns on the debug namespaces named in config. */
  applyDebugSettings(): void {
    const namespaces = this.config.debug?.enabledNamespaces;
    if (namespaces) {
      enableNamespaces(namespaces);
    }
  }
}
