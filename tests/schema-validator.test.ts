import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DEFAULT_SCHEMA_PATH } from '../src/core/config';
import { SchemaLoadError } from '../src/core/errors';
import { SchemaValidator, comparePaths, validateAgainstSchema } from '../src/validation/schema-validator';

const validRecord = () => ({
  id: 'agent-123',
  agent_name: 'agent-123',
  label: 'Agent 123',
  description: 'Test agent',
  version: '1.0.0',
  provider: { name: 'Agent 123', url: 'https://example.com' },
  endpoints: { static: ['https://api.example.com/v1/invoke'] },
  capabilities: {
    modalities: ['text'],
    authentication: { methods: ['none'] },
  },
  skills: [
    {
      id: 'skill:text',
      description: 'Capability skill for text',
      inputModes: ['text'],
      outputModes: ['text'],
    },
  ],
});

describe('SchemaValidator with the bundled AgentFacts schema', () => {
  const validator = SchemaValidator.fromFile(DEFAULT_SCHEMA_PATH);

  it('accepts a complete record', () => {
    expect(validator.validate(validRecord())).toEqual({ valid: true, errors: [] });
  });

  it('reports a missing skill field at the skill path', () => {
    const record = validRecord();
    const { inputModes: _dropped, ...skill } = record.skills[0];
    const result = validator.validate({ ...record, skills: [skill] });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: ['skills', 0],
        rule: 'required',
        message: "must have required property 'inputModes'",
        value: skill,
      },
    ]);
  });

  it('reports a negative latency budget as a minimum violation', () => {
    const record = validRecord();
    const result = validator.validate({
      ...record,
      skills: [{ ...record.skills[0], latencyBudgetMs: -5 }],
    });

    expect(result.errors).toEqual([
      {
        path: ['skills', 0, 'latencyBudgetMs'],
        rule: 'minimum',
        message: 'must be >= 0',
        value: -5,
      },
    ]);
  });

  it('reports empty skills and modalities', () => {
    const record = validRecord();
    const result = validator.validate({
      ...record,
      capabilities: { ...record.capabilities, modalities: [] },
      skills: [],
    });

    expect(result.errors.map((error) => [error.path, error.rule, error.message])).toEqual([
      [['capabilities', 'modalities'], 'minItems', 'must NOT have fewer than 1 items'],
      [['skills'], 'minItems', 'must NOT have fewer than 1 items'],
    ]);
  });

  it('sorts errors by path', () => {
    const result = validator.validate({ ...validRecord(), id: 7, version: false, provider: {} });

    expect(result.errors.map((error) => error.path)).toEqual([['id'], ['provider'], ['provider'], ['version']]);
    expect(result.errors.map((error) => error.message)).toEqual([
      'must be string',
      "must have required property 'name'",
      "must have required property 'url'",
      'must be string',
    ]);
  });

  it('reports a non-object record at the root path', () => {
    expect(validator.validate('agent').errors).toEqual([
      { path: [], rule: 'type', message: 'must be object', value: 'agent' },
    ]);
  });
});

describe('validateAgainstSchema keywords', () => {
  const rules = (record: unknown, schema: unknown): string[] =>
    validateAgainstSchema(record, schema).errors.map((error) => error.rule);

  it('checks string and number bounds', () => {
    const schema = {
      type: 'object',
      properties: {
        code: { type: 'string', minLength: 2, maxLength: 3, pattern: '^[A-Z]+$' },
        score: { type: 'number', exclusiveMinimum: 0, maximum: 10 },
      },
    };

    const tooLong = validateAgainstSchema({ code: 'ab12', score: 11 }, schema).errors;
    expect(tooLong.map((error) => error.path)).toEqual([['code'], ['code'], ['score']]);
    expect(tooLong.map((error) => error.rule).sort()).toEqual(['maxLength', 'maximum', 'pattern']);
    expect(rules({ code: 'A', score: 0 }, schema)).toEqual(['minLength', 'exclusiveMinimum']);
  });

  it('distinguishes integers from numbers', () => {
    expect(validateAgainstSchema(3, { type: 'integer' }).valid).toBe(true);
    expect(validateAgainstSchema(3.5, { type: 'integer' }).errors[0].message).toBe('must be integer');
    expect(validateAgainstSchema(3, { type: 'number' }).valid).toBe(true);
  });

  it('checks enum, const and unique items', () => {
    expect(validateAgainstSchema('b', { enum: ['a', 1] }).errors[0]).toMatchObject({
      rule: 'enum',
      message: 'must be equal to one of the allowed values',
    });
    expect(validateAgainstSchema({ a: 1 }, { const: { a: 1 } }).valid).toBe(true);
    expect(rules([1, 2, 1], { uniqueItems: true })).toEqual(['uniqueItems']);
  });

  it('rejects unexpected properties when closed', () => {
    const record = { a: 1, b: 2, c: 3 };
    const result = validateAgainstSchema(record, {
      type: 'object',
      properties: { a: { type: 'number' } },
      additionalProperties: false,
    });
    expect(result.errors).toEqual([
      { path: [], rule: 'additionalProperties', message: "must NOT have additional properties ('b')", value: record },
      { path: [], rule: 'additionalProperties', message: "must NOT have additional properties ('c')", value: record },
    ]);
  });

  it('validates extra properties against a schema', () => {
    const result = validateAgainstSchema({ a: 'x', b: 2 }, { additionalProperties: { type: 'string' } });
    expect(result.errors.map((error) => error.path)).toEqual([['b']]);
  });

  it('lets pattern properties satisfy a closed object', () => {
    const schema = { patternProperties: { '^x-': { type: 'string' } }, additionalProperties: false };
    expect(validateAgainstSchema({ 'x-a': 'v' }, schema).valid).toBe(true);
    expect(validateAgainstSchema({ 'x-a': 1, other: true }, schema).errors.map((error) => [error.path, error.rule])).toEqual([
      [[], 'additionalProperties'],
      [['x-a'], 'type'],
    ]);
  });

  it('combines subschemas', () => {
    expect(validateAgainstSchema(5, { anyOf: [{ type: 'string' }, { minimum: 3 }] }).valid).toBe(true);
    expect(rules(1, { anyOf: [{ type: 'string' }, { minimum: 3 }] })).toContain('anyOf');
    expect(validateAgainstSchema(5, { oneOf: [{ type: 'number' }, { minimum: 3 }] }).errors).toEqual([
      { path: [], rule: 'oneOf', message: 'must match exactly one schema in oneOf', value: 5 },
    ]);
    expect(rules('', { allOf: [{ type: 'string' }, { minLength: 1 }] })).toEqual(['minLength']);
  });

  it('applies not and if/then', () => {
    expect(validateAgainstSchema('abc', { not: { type: 'string' } }).errors).toEqual([
      { path: [], rule: 'not', message: 'must NOT be valid', value: 'abc' },
    ]);
    expect(validateAgainstSchema(3, { not: { type: 'string' } }).valid).toBe(true);

    const conditional = { if: { type: 'string' }, then: { minLength: 5 } };
    expect(rules('ab', conditional)).toEqual(expect.arrayContaining(['minLength', 'if']));
    expect(validateAgainstSchema('abcdef', conditional).valid).toBe(true);
    expect(validateAgainstSchema(7, conditional).valid).toBe(true);
  });

  it('accepts boolean subschemas', () => {
    const schema = { properties: { a: true, b: false } };
    expect(validateAgainstSchema({ a: 1 }, schema).valid).toBe(true);
    expect(validateAgainstSchema({ b: 1 }, schema).errors).toEqual([
      { path: ['b'], rule: 'false schema', message: 'boolean schema is false', value: 1 },
    ]);
    expect(validateAgainstSchema('anything', true).valid).toBe(true);
    expect(validateAgainstSchema('anything', false).valid).toBe(false);
  });

  it('decodes escaped pointer segments in error paths', () => {
    const result = validateAgainstSchema({ 'a/b': { 'c~d': 1 } }, {
      properties: { 'a/b': { properties: { 'c~d': { type: 'string' } } } },
    });
    expect(result.errors.map((error) => [error.path, error.value])).toEqual([[['a/b', 'c~d'], 1]]);
  });

  it('follows recursive local references', () => {
    const tree = {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' },
        children: { type: 'array', items: { $ref: '#' } },
      },
    };
    const result = validateAgainstSchema({ name: 'root', children: [{ name: 'a' }, { children: [] }] }, tree);
    expect(result.errors.map((error) => [error.path, error.rule])).toEqual([[['children', 1], 'required']]);
  });
});

describe('comparePaths', () => {
  it('orders indices before keys and prefixes first', () => {
    const paths = [['skills', 'x'], ['skills', 1], ['skills'], ['id'], ['skills', 0, 'id']];
    expect([...paths].sort(comparePaths)).toEqual([['id'], ['skills'], ['skills', 0, 'id'], ['skills', 1], ['skills', 'x']]);
  });
});

describe('SchemaValidator loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'schema-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fails on a missing schema file', () => {
    const missing = path.join(dir, 'missing.json');
    expect(() => SchemaValidator.fromFile(missing)).toThrow(SchemaLoadError);
    expect(() => SchemaValidator.fromFile(missing)).toThrow(`AgentFacts schema not found at ${missing}`);
  });

  it('fails on invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    writeFileSync(file, '{ "type": ');
    expect(() => SchemaValidator.fromFile(file)).toThrow(`Invalid JSON in schema file ${file}`);
  });

  it('fails on an unknown type keyword', () => {
    expect(() => new SchemaValidator({ type: 'text' })).toThrow(SchemaLoadError);
  });

  it('fails on a document that is not a schema', () => {
    expect(() => new SchemaValidator(['string'])).toThrow(
      'Invalid JSON Schema document: expected an object or a boolean'
    );
  });

  it('fails on a dangling reference', () => {
    const load = () => new SchemaValidator({ items: { $ref: '#/definitions/missing' } });
    expect(load).toThrow(SchemaLoadError);
    expect(load).toThrow(/#\/definitions\/missing/);
  });

  it('fails at load on a pattern that is not a unicode regular expression', () => {
    const schema = { properties: { id: { type: 'string', pattern: '^[a-z\\_]+$' } } };
    expect(() => new SchemaValidator(schema)).toThrow(SchemaLoadError);
  });

  it('fails at load on a reference cycle over the same value', () => {
    expect(() => new SchemaValidator({ $ref: '#' })).toThrow(
      'Schema has a $ref cycle that never descends into the record'
    );
    expect(
      () =>
        new SchemaValidator({
          anyOf: [{ type: 'string' }, { $ref: '#/definitions/loop' }],
          definitions: { loop: { allOf: [{ $ref: '#' }] } },
        })
    ).toThrow(SchemaLoadError);
  });

  it('keeps the source in the validator', () => {
    const file = path.join(dir, 'schema.json');
    writeFileSync(file, JSON.stringify({ type: 'string' }));
    const validator = SchemaValidator.fromFile(file);
    expect(validator.source).toBe(file);
    expect(validator.validate('ok').valid).toBe(true);
  });
});
