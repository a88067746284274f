import type { AgentConfig, JsonSchema } from '../../configManager.js';

export interface JsonTemplateResult {
  instructions: string;
  schema?: string | JsonSchema;
  example?: Record<string, unknown>;
}

/**
 * JSON return instructions appended to an agent's system prompt. An agent
 * config in object mode swaps the schema for an example; otherwise the config's
 * schema or the agent's built-in one is shown.
 */
export function buildJsonReturnTemplate(agentConfig: AgentConfig | undefined, defaultSchema: JsonSchema): JsonTemplateResult {
  if (agentConfig?.jsonMode === 'object' && agentConfig.jsonExample) {
    return {
      instructions: 'Return ONLY a JSON object shaped like the example. Do not include prose or markdown.',
      example: agentConfig.jsonExample
    };
  }

  return {
    instructions: 'Return ONLY JSON matching the provided schema. Do not include prose or markdown.',
    schema: agentConfig?.jsonSchema ?? defaultSchema
  };
}

export function renderJsonReturnTemplate(template: JsonTemplateResult): string {
  const parts = ['\n[OUTPUT FORMAT]\n', template.instructions];
  if (template.schema) {
    parts.push('\nSchema:\n');
    parts.push(typeof template.schema === 'string' ? template.schema : JSON.stringify(template.schema, null, 2));
  }
  if (template.example) {
    parts.push('\nExample:\n');
    parts.push(JSON.stringify(template.example, null, 2));
  }
  return parts.join('');
}
