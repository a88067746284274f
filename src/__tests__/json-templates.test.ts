import { describe, it, expect } from 'vitest';
import { buildJsonReturnTemplate, renderJsonReturnTemplate } from '../agents/context/jsonTemplates.js';

const defaultSchema = { type: 'object', required: ['score'] };

describe('buildJsonReturnTemplate', () => {
  it('uses the built-in schema without agent config', () => {
    const tpl = buildJsonReturnTemplate(undefined, defaultSchema);
    expect(tpl.instructions).toContain('schema');
    expect(tpl.schema).toEqual(defaultSchema);
    expect(tpl.example).toBeUndefined();
  });

  it('returns object-mode instructions with example', () => {
    const tpl = buildJsonReturnTemplate({ jsonMode: 'object', jsonExample: { ok: true } }, defaultSchema);
    expect(tpl.instructions).toContain('Return ONLY a JSON object');
    expect(tpl.example).toEqual({ ok: true });
    expect(tpl.schema).toBeUndefined();
  });

  it('keeps the schema when object mode has no example', () => {
    const tpl = buildJsonReturnTemplate({ jsonMode: 'object' }, defaultSchema);
    expect(tpl.schema).toEqual(defaultSchema);
  });

  it('prefers a configured schema', () => {
    const schema = { type: 'object', properties: { foo: { type: 'string' } }, required: ['foo'] };
    const tpl = buildJsonReturnTemplate({ jsonMode: 'schema', jsonSchema: schema }, defaultSchema);
    expect(tpl.schema).toEqual(schema);
  });
});

describe('renderJsonReturnTemplate', () => {
  it('renders a schema section', () => {
    expect(renderJsonReturnTemplate({ instructions: 'Return JSON.', schema: { type: 'object' } })).toBe(
      '\n[OUTPUT FORMAT]\nReturn JSON.\nSchema:\n{\n  "type": "object"\n}'
    );
  });

  it('renders schema text verbatim', () => {
    expect(renderJsonReturnTemplate({ instructions: 'Return JSON.', schema: '{"type":"array"}' })).toBe(
      '\n[OUTPUT FORMAT]\nReturn JSON.\nSchema:\n{"type":"array"}'
    );
  });

  it('renders an example section', () => {
    expect(renderJsonReturnTemplate({ instructions: 'Like this.', example: { ok: true } })).toBe(
      '\n[OUTPUT FORMAT]\nLike this.\nExample:\n{\n  "ok": true\n}'
    );
  });
});
