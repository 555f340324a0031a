import type { EnrichmentField, EvaluationKind } from '../evaluation.types';
import { SPEAKING_NORMALIZATION, WRITING_NORMALIZATION, type NormalizationTable } from '../normalization/alias-tables';
import {
  buildEvaluationSchema,
  type CriterionDefinition,
  type JsonSchemaNode,
} from '../schemas/evaluation.schemas';

export type EvaluationSkill = 'speaking' | 'writing';

export type EvaluationProfile = {
  kind: EvaluationKind;
  skill: EvaluationSkill;
  systemPromptAsset: string;
  criteria: readonly CriterionDefinition[];
  enrichment: readonly EnrichmentField[];
  normalization: NormalizationTable;
  schema: JsonSchemaNode;
};

const SPEAKING_CRITERIA: readonly CriterionDefinition[] = [
  { key: 'coherence', description: 'Fluency and coherence: logical flow, linking, topic development' },
  { key: 'lexical_resource', description: 'Range, precision and naturalness of vocabulary' },
  { key: 'grammatical_range', description: 'Range and accuracy of grammatical structures' },
  { key: 'task_response', description: 'How fully and relevantly the question is answered' },
];

const WRITING_CRITERIA: readonly CriterionDefinition[] = [
  { key: 'task_achievement', description: 'Task achievement or task response: coverage and position' },
  { key: 'coherence', description: 'Coherence and cohesion: paragraphing, progression, linking' },
  { key: 'lexical_resource', description: 'Range, precision and spelling of vocabulary' },
  { key: 'grammatical_range', description: 'Range and accuracy of grammatical structures and punctuation' },
];

const SPEAKING_ENRICHMENT: readonly EnrichmentField[] = [
  'grammar_corrections',
  'vocabulary_upgrades',
  'pronunciation_warnings',
  'strengths',
  'improvement_priorities',
];

const WRITING_ENRICHMENT: readonly EnrichmentField[] = [
  'grammar_corrections',
  'vocabulary_upgrades',
  'paragraph_feedback',
  'strengths',
  'improvement_priorities',
];

const defineProfile = (
  kind: EvaluationKind,
  skill: EvaluationSkill,
  systemPromptAsset: string,
  enrichment: readonly EnrichmentField[],
): EvaluationProfile => {
  const criteria = skill === 'speaking' ? SPEAKING_CRITERIA : WRITING_CRITERIA;
  return {
    kind,
    skill,
    systemPromptAsset,
    criteria,
    enrichment,
    normalization: skill === 'speaking' ? SPEAKING_NORMALIZATION : WRITING_NORMALIZATION,
    schema: buildEvaluationSchema(criteria, enrichment),
  };
};

export const EVALUATION_PROFILES: Record<EvaluationKind, EvaluationProfile> = {
  'speaking-basic': defineProfile('speaking-basic', 'speaking', 'speaking.system.txt', []),
  'speaking-enhanced': defineProfile(
    'speaking-enhanced',
    'speaking',
    'speaking-enhanced.system.txt',
    SPEAKING_ENRICHMENT,
  ),
  'writing-basic': defineProfile('writing-basic', 'writing', 'writing.system.txt', []),
  'writing-enhanced': defineProfile(
    'writing-enhanced',
    'writing',
    'writing-enhanced.system.txt',
    WRITING_ENRICHMENT,
  ),
};
