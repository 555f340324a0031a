import type { EnrichmentField } from '../evaluation.types';

/**
 * The subset of JSON Schema the evaluation payloads need. One definition
 * feeds both Ajv validation and the hosted model's response constraint.
 */
export type JsonSchemaNode = {
  type: 'object' | 'array' | 'string' | 'number';
  description?: string;
  properties?: Record<string, JsonSchemaNode>;
  required?: string[];
  items?: JsonSchemaNode;
  minimum?: number;
  maximum?: number;
  default?: unknown[];
};

export type CriterionDefinition = {
  key: string;
  description: string;
};

const text = (description: string): JsonSchemaNode => ({ type: 'string', description });

const record = (properties: Record<string, JsonSchemaNode>, description?: string): JsonSchemaNode => ({
  type: 'object',
  ...(description && { description }),
  properties,
  required: Object.keys(properties),
});

const list = (items: JsonSchemaNode, description: string): JsonSchemaNode => ({
  type: 'array',
  description,
  items,
  default: [],
});

export const criterionSchema = (description: string): JsonSchemaNode =>
  record(
    {
      score: {
        type: 'number',
        minimum: 0,
        maximum: 9,
        description: 'Band score from 0 to 9 in steps of 0.5',
      },
      feedback: text('Two or three sentences of examiner feedback for this criterion'),
    },
    description,
  );

export const ENRICHMENT_SCHEMAS: Record<EnrichmentField, JsonSchemaNode> = {
  grammar_corrections: list(
    record({
      original: text('The erroneous phrase exactly as the candidate produced it'),
      corrected: text('The corrected phrase'),
      explanation: text('Short explanation of the grammar rule'),
    }),
    'Grammar mistakes found in the response, most important first',
  ),
  vocabulary_upgrades: list(
    record({
      basic_word: text('A plain word or phrase the candidate used'),
      alternatives: { type: 'array', items: text('A more precise or idiomatic alternative') },
      example: text('The candidate sentence rewritten with one alternative'),
    }),
    'Vocabulary the candidate could upgrade',
  ),
  pronunciation_warnings: list(
    record({
      word: text('A word learners commonly mispronounce'),
      phonetic: text('IPA transcription'),
      tip: text('How to pronounce it correctly'),
    }),
    'Words from the transcript that are often mispronounced',
  ),
  paragraph_feedback: list(text('Feedback on one paragraph, in essay order'), 'One entry per paragraph'),
  strengths: list(text('A concrete strength'), 'What the candidate did well'),
  improvement_priorities: list(text('A concrete next step'), 'The most valuable things to work on next'),
};

export const buildEvaluationSchema = (
  criteria: readonly CriterionDefinition[],
  enrichment: readonly EnrichmentField[],
): JsonSchemaNode => {
  const properties: Record<string, JsonSchemaNode> = {};
  for (const criterion of criteria) {
    properties[criterion.key] = criterionSchema(criterion.description);
  }
  properties.overall_feedback = text('A short overall summary addressed to the candidate');
  for (const field of enrichment) {
    properties[field] = ENRICHMENT_SCHEMAS[field];
  }

  return {
    type: 'object',
    properties,
    required: [...criteria.map((criterion) => criterion.key), 'overall_feedback'],
  };
};
