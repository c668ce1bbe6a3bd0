/**
 * Template loading and prompt building tests
 */

import * as path from 'path';
import {
  buildClassificationSchema,
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
  buildExtractionSchema,
  buildExtractionSystemPrompt,
  documentKindFor,
  findTemplateForCorrespondent,
  getTemplateById,
  loadTemplatesConfig,
  parseTemplatesConfig,
  resolveFieldMapping,
  ConfigurationError,
  CLASSIFICATION_PREVIEW_LENGTH,
} from '@docmerge/shared';
import { makeTemplate, makeTemplatesConfig } from './helpers';

const TEMPLATES_PATH = path.join(__dirname, '../../config/templates.json');

function rawTemplate(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    description: `Template ${id}`,
    extraction: {
      fields: [
        { name: 'issue_date', type: 'date', required: true },
        { name: 'reference', type: 'string' },
      ],
    },
    ...extra,
  };
}

function rawFile(templates: unknown[], extra: Record<string, unknown> = {}) {
  return {
    base_prompts: { gatekeeper: 'Classify', specialist: 'Extract' },
    templates,
    ...extra,
  };
}

describe('loadTemplatesConfig', () => {
  const templates = loadTemplatesConfig(TEMPLATES_PATH);

  it('should load every shipped template', () => {
    expect(templates.templates.map((template) => template.id)).toEqual([
      'utilities_energy',
      'utilities_water',
      'tax_at_guides',
      'law_enforcement_fines',
      'fallback_general',
    ]);
  });

  it('should give every shipped template its own document kind', () => {
    for (const template of templates.templates) {
      expect(documentKindFor(template.id)).toBe(template.id);
    }
  });

  it('should put explicit mappings before defaults', () => {
    const energy = getTemplateById(templates, 'utilities_energy');

    expect(energy?.fieldMapping.get('consumption_kwh')).toBe('gen_consumption');
    expect(energy?.fieldMapping.get('total_gross')).toBe('amt_primary');
    expect(energy?.fieldMapping.has('contract_power')).toBe(false);
    expect(energy ? [...energy.fieldMapping.keys()][0] : null).toBe('consumption_kwh');
  });

  it('should apply template defaults', () => {
    const water = getTemplateById(templates, 'utilities_water');
    const fines = getTemplateById(templates, 'law_enforcement_fines');

    expect(water?.minConfidence).toBeNull();
    expect(water?.correspondentHint).toBeNull();
    expect(water?.autoDueDateDays).toBeNull();
    expect(fines?.autoDueDateDays).toBe(15);
    expect(fines?.tagsAdd).toEqual(['fines', 'priority']);
  });

  it('should fail when the file does not exist', () => {
    expect(() => loadTemplatesConfig(path.join(__dirname, 'missing.json'))).toThrow(ConfigurationError);
  });
});

describe('parseTemplatesConfig', () => {
  it('should map snake_case keys onto templates', () => {
    const parsed = parseTemplatesConfig(
      rawFile([
        rawTemplate('bank', {
          correspondent_hint: 'Bank',
          correspondent_ids: [7],
          title_format: '{issue_date} | {reference}',
          tags_add: ['bank'],
          min_confidence: 0.8,
        }),
      ])
    );

    const bank = parsed.templates[0];
    expect(parsed.basePrompts).toEqual({ gatekeeper: 'Classify', specialist: 'Extract' });
    expect(bank.correspondentHint).toBe('Bank');
    expect(bank.correspondentIds).toEqual([7]);
    expect(bank.titleFormat).toBe('{issue_date} | {reference}');
    expect(bank.minConfidence).toBe(0.8);
    expect(bank.extraction.rules).toBe('');
    expect(bank.extraction.fields[1]).toEqual({
      name: 'reference',
      type: 'string',
      required: false,
      description: '',
    });
  });

  it('should let a file-level mapping override the defaults', () => {
    const parsed = parseTemplatesConfig(
      rawFile([rawTemplate('bank')], { field_mapping: { issue_date: 'Statement Date' } })
    );

    expect(parsed.templates[0].fieldMapping.get('issue_date')).toBe('Statement Date');
    expect(parsed.templates[0].fieldMapping.has('reference')).toBe(false);
  });

  it('should reject data that does not match the schema', () => {
    expect(() => parseTemplatesConfig({ templates: [] })).toThrow(ConfigurationError);
    expect(() => parseTemplatesConfig(rawFile([rawTemplate('Bad-Id')]))).toThrow(
      'Invalid templates configuration'
    );
    expect(() =>
      parseTemplatesConfig(rawFile([{ ...rawTemplate('bank'), extraction: { fields: [{ name: 'x', type: 'money' }] } }]))
    ).toThrow(ConfigurationError);
  });

  it('should reject duplicate template ids', () => {
    expect(() => parseTemplatesConfig(rawFile([rawTemplate('bank'), rawTemplate('bank')]))).toThrow(
      'Duplicate template id: bank'
    );
  });
});

describe('resolveFieldMapping', () => {
  it('should only add defaults for template fields', () => {
    const mapping = resolveFieldMapping(
      { reference: 'Ref' },
      [
        { name: 'issue_date', type: 'date', required: true, description: '' },
        { name: 'reference', type: 'string', required: false, description: '' },
      ],
      new Map([
        ['issue_date', 'Issue Date'],
        ['total_gross', 'Total'],
      ])
    );

    expect([...mapping]).toEqual([
      ['reference', 'Ref'],
      ['issue_date', 'Issue Date'],
    ]);
  });
});

describe('findTemplateForCorrespondent', () => {
  const config = makeTemplatesConfig([
    makeTemplate({ id: 'energy', correspondentIds: [3], correspondentHint: 'EDP' }),
    makeTemplate({ id: 'water', correspondentHint: 'Aguas' }),
  ]);

  it('should match by correspondent id first', () => {
    expect(findTemplateForCorrespondent(config, 3, 'Aguas do Porto')?.id).toBe('energy');
  });

  it('should fall back to the name hint', () => {
    expect(findTemplateForCorrespondent(config, 99, 'Aguas do Porto')?.id).toBe('water');
    expect(findTemplateForCorrespondent(config, null, 'edp comercial')?.id).toBe('energy');
    expect(findTemplateForCorrespondent(config, null, 'Unknown')).toBeUndefined();
    expect(findTemplateForCorrespondent(config, null)).toBeUndefined();
  });
});

describe('prompts', () => {
  it('should list templates in the classification prompt', () => {
    expect(buildClassificationSystemPrompt('  Classify.  ', [makeTemplate()])).toBe(
      'Classify.\n\nAvailable templates:\n- test_template: Test template'
    );
  });

  it('should limit the classification preview', () => {
    const prompt = buildClassificationUserPrompt('x'.repeat(CLASSIFICATION_PREVIEW_LENGTH + 500));
    expect(prompt).toContain('x'.repeat(CLASSIFICATION_PREVIEW_LENGTH));
    expect(prompt).not.toContain('x'.repeat(CLASSIFICATION_PREVIEW_LENGTH + 1));
  });

  it('should restrict classification to the configured ids', () => {
    const schema = buildClassificationSchema(['a', 'b']);
    expect(schema.schema.properties.template_id.enum).toEqual(['a', 'b']);
  });

  it('should mark required fields in the extraction prompt', () => {
    const prompt = buildExtractionSystemPrompt('Extract.', makeTemplate());
    expect(prompt.split('\n')).toEqual([
      'Extract.',
      '',
      'Template: test_template - Test template',
      '',
      'Extraction Rules:',
      'Extract test fields',
      '',
      'Fields to extract:',
      '- issue_date (date): No description [REQUIRED]',
      '- total_gross (amount): No description [REQUIRED]',
      '- invoice_number (string): No description',
    ]);
  });

  it('should require every field in the extraction schema', () => {
    const schema = buildExtractionSchema(makeTemplate());
    expect(schema.name).toBe('extract_test_template');
    expect(schema.schema.properties.fields.required).toEqual(['issue_date', 'total_gross', 'invoice_number']);
    expect(schema.schema.properties.fields.properties.issue_date).toEqual({
      type: ['string', 'null'],
      description: 'issue_date',
    });
  });
});
