import { describe, it, expect } from 'vitest';
import { compileSchema, tryJsonRepair, validateJson } from '../agents/context/jsonValidation.js';
import { SCENE_DOCUMENT_SCHEMA, SCENE_EVALUATION_SCHEMA } from '../agents/context/schemas.js';
import type { SceneDocument, SceneEvaluation } from '../types/Scene.js';
import { cellarScene } from './fixtures/scenes.js';

describe('validateJson', () => {
  const evaluationValidator = compileSchema<SceneEvaluation>(SCENE_EVALUATION_SCHEMA);

  it('accepts valid JSON as-is', () => {
    const result = validateJson('{"score": 3, "reason": "fine"}', evaluationValidator);
    expect(result).toEqual({ valid: true, parsed: { score: 3, reason: 'fine' }, repaired: false });
  });

  it('repairs before validating', () => {
    const result = validateJson('{"score": 3, "reason": "fine",}', evaluationValidator);
    expect(result.valid).toBe(true);
    expect(result.repaired).toBe(true);
  });

  it('returns path-aware errors', () => {
    const result = validateJson('{"score": 3,}', evaluationValidator);
    expect(result).toEqual({
      valid: false,
      parsed: { score: 3 },
      errors: ["(root) must have required property 'reason'"],
      errorDetails: [{ path: '(root)', message: "must have required property 'reason'" }],
      repaired: true
    });
  });

  it('reports nested paths', () => {
    const result = validateJson('{"score": 2.5, "reason": "half"}', evaluationValidator);
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors).toEqual(['/score must be integer']);
  });

  it('checks scene and ending names', () => {
    const validator = compileSchema<SceneDocument>(SCENE_DOCUMENT_SCHEMA);
    expect(validateJson(JSON.stringify(cellarScene), validator).valid).toBe(true);

    const result = validateJson('{"Epilogue": {"flow": "The end."}}', validator);
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors).toEqual(['(root) must NOT have additional properties']);
  });

  it('rejects a scene missing its triggers', () => {
    const validator = compileSchema<SceneDocument>(SCENE_DOCUMENT_SCHEMA);
    const attic = { setting: 'The attic', characters: 'nobody', plotChain: [], flow: {}, interactions: { dialogue: [], actions: [] } };
    const result = validateJson(JSON.stringify({ SceneAttic: attic }), validator);
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors).toEqual(["/SceneAttic must have required property 'triggers'"]);
  });
});

describe('compileSchema', () => {
  it('accepts schema text', () => {
    const validator = compileSchema<number[]>('{"type": "array", "items": {"type": "number"}}');
    expect(validator([1, 2])).toBe(true);
    expect(validator(['x'])).toBe(false);
  });
});

describe('tryJsonRepair', () => {
  it('quotes keys and strings', () => {
    expect(JSON.parse(tryJsonRepair("{score: 4, reason: 'fits'}") ?? 'null')).toEqual({ score: 4, reason: 'fits' });
  });
});
