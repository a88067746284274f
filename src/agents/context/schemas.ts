import type { JsonSchema } from '../../configManager.js';

const sceneContentSchema: JsonSchema = {
  type: 'object',
  required: ['setting', 'characters', 'plotChain', 'flow', 'interactions', 'triggers'],
  properties: {
    setting: { type: 'string' },
    characters: { type: 'string' },
    plotChain: { type: 'array', items: { type: 'string' } },
    flow: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: {
          anyOf: [
            { type: 'string' },
            { type: 'object', additionalProperties: { type: 'string' } }
          ]
        }
      }
    },
    interactions: {
      type: 'object',
      required: ['dialogue', 'actions'],
      properties: {
        dialogue: { type: 'array', items: { type: 'string' } },
        actions: { type: 'array', items: { type: 'string' } }
      }
    },
    triggers: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['narration', 'goto'],
        properties: {
          narration: { type: 'string' },
          clue: { type: 'string' },
          goto: { type: 'string' }
        }
      }
    }
  }
};

const endingContentSchema: JsonSchema = {
  type: 'object',
  required: ['flow'],
  properties: {
    flow: { type: 'string' }
  }
};

/** Scene names must start with "Scene", ending names with "Ending". */
export const SCENE_DOCUMENT_SCHEMA: JsonSchema = {
  type: 'object',
  minProperties: 1,
  patternProperties: {
    '^Scene': sceneContentSchema,
    '^Ending': endingContentSchema
  },
  additionalProperties: false
};

export const SCENE_EVALUATION_SCHEMA: JsonSchema = {
  type: 'object',
  required: ['score', 'reason'],
  properties: {
    score: { type: 'integer', minimum: 0, maximum: 5 },
    reason: { type: 'string' }
  }
};
