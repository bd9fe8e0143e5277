import path from 'node:path';
import { resolveBridgeConfig } from '../src/core/config';
import { ConfigurationError, MissingIdentityError } from '../src/core/errors';
import { RecordTranslator, createRecordTranslator } from '../src/core/record-translator';
import { TaxonomyIndex } from '../src/taxonomies/taxonomy-index';
import { SchemaValidator } from '../src/validation/schema-validator';

const CATALOG_ROOT = path.join(__dirname, 'fixtures', 'taxonomy');
const validator = new SchemaValidator({
  type: 'object',
  required: ['id', 'skills'],
  properties: { skills: { type: 'array', minItems: 2 } },
});

describe('RecordTranslator', () => {
  const { index } = TaxonomyIndex.load(CATALOG_ROOT);
  const translator = new RecordTranslator({
    taxonomy: index,
    validator,
    placeholderUrl: 'https://placeholder.test',
    registryId: 'partner',
    now: () => new Date('2026-03-03T03:03:03.000Z'),
  });

  it('matches capabilities through the taxonomy', () => {
    expect(translator.matchCapability('chat')?.skill_id).toBe('dialogue_generation');
    expect(translator.matchCapability('incomprehensible_capability_xyz')).toBeNull();
  });

  it('translates and reports schema violations without throwing', () => {
    const { record, validation } = translator.translateAndValidate({ id: 'solo', capabilities: ['vision'] });

    expect(record.skills.map((skill) => skill.id)).toEqual(['image_classification']);
    expect(record.provider.url).toBe('https://placeholder.test');
    expect(validation).toEqual({
      valid: false,
      errors: [
        {
          path: ['skills'],
          rule: 'minItems',
          message: 'must NOT have fewer than 2 items',
          value: record.skills,
        },
      ],
    });
  });

  it('propagates translation errors', () => {
    expect(() => translator.translateAndValidate({ capabilities: ['chat'] })).toThrow(MissingIdentityError);
  });

  it('uses its registry id and clock for directory records', () => {
    expect(translator.toNandaEntry({ name: 'dir-agent' })).toMatchObject({
      federated_id: '@partner:dir-agent',
      last_updated: '2026-03-03T03:03:03.000Z',
    });
    expect(translator.toOASFRecord({ agent_id: 'reg-agent:v1', capabilities: ['tool'] }).skills).toEqual([
      { id: 301, name: 'agent_orchestration/tool_use_planning' },
    ]);
  });

  it('converts records back to registry entries', () => {
    const record = translator.toAgentFacts({ id: 'round', capabilities: ['chat'], endpoints: ['https://round.example.com'] });
    expect(translator.toRegistryEntry(record)).toMatchObject({
      id: 'round',
      capabilities: ['chat'],
      endpoints: ['https://round.example.com'],
    });
  });

  it('works without a taxonomy', () => {
    const plain = new RecordTranslator({ validator });
    expect(plain.matchCapability('chat')).toBeNull();
    expect(plain.toAgentFacts({ id: 'p', capabilities: ['chat'] }).skills[0].id).toBe('skill:chat');
  });
});

describe('createRecordTranslator', () => {
  it('loads the configured taxonomy and bundled schema', () => {
    const config = resolveBridgeConfig({ OASF_SCHEMA_DIR: CATALOG_ROOT });
    const { translator, warnings } = createRecordTranslator(config);

    expect(warnings).toHaveLength(2);
    const { record, validation } = translator.translateAndValidate({
      id: 'agent-123',
      capabilities: ['text', 'math'],
      endpoints: ['https://api.example.com/v1/invoke'],
    });
    expect(record.skills.map((skill) => skill.id)).toEqual(['text_classification', 'mathematical_reasoning']);
    expect(validation).toEqual({ valid: true, errors: [] });
  });

  it('runs without a taxonomy when none is configured', () => {
    const { translator, warnings } = createRecordTranslator(resolveBridgeConfig({}));
    expect(warnings).toEqual([]);
    expect(translator.matcher).toBeUndefined();
  });

  it('requires a catalog directory when the taxonomy is mandatory', () => {
    expect(() => createRecordTranslator(resolveBridgeConfig({ OASF_TAXONOMY_REQUIRED: 'true' }))).toThrow(
      ConfigurationError
    );
  });
});
