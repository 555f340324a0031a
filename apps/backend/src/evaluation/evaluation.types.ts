/**
 * Canonical evaluation payloads. Field names follow the JSON the models are
 * asked to produce, so they stay snake_case.
 */

export type CriterionScore = {
  score: number;
  feedback: string;
};

export type SpeakingCriterion = 'coherence' | 'lexical_resource' | 'grammatical_range' | 'task_response';

export type WritingCriterion = 'task_achievement' | 'coherence' | 'lexical_resource' | 'grammatical_range';

export type ContentEvaluation = Record<SpeakingCriterion, CriterionScore> & {
  overall_feedback: string;
};

export type GrammarCorrection = {
  original: string;
  corrected: string;
  explanation: string;
};

export type VocabularyUpgrade = {
  basic_word: string;
  alternatives: string[];
  example: string;
};

export type PronunciationWarning = {
  word: string;
  phonetic: string;
  tip: string;
};

export type EnhancedReview = ContentEvaluation & {
  grammar_corrections: GrammarCorrection[];
  vocabulary_upgrades: VocabularyUpgrade[];
  pronunciation_warnings: PronunciationWarning[];
  strengths: string[];
  improvement_priorities: string[];
};

export type WritingEvaluation = Record<WritingCriterion, CriterionScore> & {
  overall_feedback: string;
};

export type WritingEnhancedReview = WritingEvaluation & {
  grammar_corrections: GrammarCorrection[];
  vocabulary_upgrades: VocabularyUpgrade[];
  paragraph_feedback: string[];
  strengths: string[];
  improvement_priorities: string[];
};

export type EnrichmentField =
  | 'grammar_corrections'
  | 'vocabulary_upgrades'
  | 'pronunciation_warnings'
  | 'paragraph_feedback'
  | 'strengths'
  | 'improvement_priorities';

export type SpeakingPart = 1 | 2 | 3;

export type WritingTaskType = 1 | 2;

export type SpeakingInput = {
  questionText: string;
  partNumber: SpeakingPart;
  transcript: string;
  referenceAnswer?: string;
};

export type WritingInput = {
  promptText: string;
  essayText: string;
  taskType: WritingTaskType;
  chartData?: string;
};

export type EvaluationInputs = {
  'speaking-basic': SpeakingInput;
  'speaking-enhanced': SpeakingInput;
  'writing-basic': WritingInput;
  'writing-enhanced': WritingInput;
};

export type EvaluationResults = {
  'speaking-basic': ContentEvaluation;
  'speaking-enhanced': EnhancedReview;
  'writing-basic': WritingEvaluation;
  'writing-enhanced': WritingEnhancedReview;
};

export type EvaluationKind = keyof EvaluationResults;

export const EVALUATION_KINDS: readonly EvaluationKind[] = [
  'speaking-basic',
  'speaking-enhanced',
  'writing-basic',
  'writing-enhanced',
];

export type ProviderName = 'gemini' | 'ollama';

export type CallMetadata = {
  providerName: ProviderName;
  modelName: string;
  responseTimeMs: number;
};

export type EvaluationOutcome<T> = {
  result: T;
  meta: CallMetadata;
};
