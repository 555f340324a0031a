export type AliasTable = Readonly<Record<string, string>>;

export type NormalizationTable = {
  criteria: readonly string[];
  scoreAliases: AliasTable;
  feedbackAliases: AliasTable;
  nestedAliases: AliasTable;
};

// Names small local models use for vocabulary, grammar and the summary,
// whichever skill is being scored.
const LEXICAL_SCORE_ALIASES: AliasTable = {
  vocabulary_score: 'lexical_resource_score',
  lexical_score: 'lexical_resource_score',
  vocab_score: 'lexical_resource_score',
};

const GRAMMAR_SCORE_ALIASES: AliasTable = {
  grammar_score: 'grammatical_range_score',
  grammatical_range_and_accuracy_score: 'grammatical_range_score',
  grammatical_accuracy_score: 'grammatical_range_score',
};

const LEXICAL_FEEDBACK_ALIASES: AliasTable = {
  vocabulary_feedback: 'lexical_resource_feedback',
  lexical_feedback: 'lexical_resource_feedback',
};

const GRAMMAR_FEEDBACK_ALIASES: AliasTable = {
  grammar_feedback: 'grammatical_range_feedback',
  grammatical_accuracy_feedback: 'grammatical_range_feedback',
};

const LEXICAL_NESTED_ALIASES: AliasTable = {
  vocabulary: 'lexical_resource',
  lexical: 'lexical_resource',
  vocab: 'lexical_resource',
};

const GRAMMAR_NESTED_ALIASES: AliasTable = {
  grammar: 'grammatical_range',
  grammatical_range_and_accuracy: 'grammatical_range',
  grammar_range: 'grammatical_range',
  grammatical_accuracy: 'grammatical_range',
};

const SUMMARY_NESTED_ALIASES: AliasTable = {
  feedback: 'overall_feedback',
  summary: 'overall_feedback',
  overall: 'overall_feedback',
  general_feedback: 'overall_feedback',
  examiner_feedback: 'overall_feedback',
};

export const SPEAKING_NORMALIZATION: NormalizationTable = {
  criteria: ['coherence', 'lexical_resource', 'grammatical_range', 'task_response'],
  scoreAliases: {
    coherence_and_cohesion_score: 'coherence_score',
    fluency_and_coherence_score: 'coherence_score',
    fluency_coherence_score: 'coherence_score',
    fluency_score: 'coherence_score',
    ...LEXICAL_SCORE_ALIASES,
    ...GRAMMAR_SCORE_ALIASES,
    task_achievement_score: 'task_response_score',
    relevance_score: 'task_response_score',
  },
  feedbackAliases: {
    coherence_and_cohesion_feedback: 'coherence_feedback',
    fluency_and_coherence_feedback: 'coherence_feedback',
    ...LEXICAL_FEEDBACK_ALIASES,
    ...GRAMMAR_FEEDBACK_ALIASES,
    task_achievement_feedback: 'task_response_feedback',
    relevance_feedback: 'task_response_feedback',
  },
  nestedAliases: {
    coherence_and_cohesion: 'coherence',
    fluency_and_coherence: 'coherence',
    fluency_coherence: 'coherence',
    fluency: 'coherence',
    ...LEXICAL_NESTED_ALIASES,
    ...GRAMMAR_NESTED_ALIASES,
    task_achievement: 'task_response',
    task: 'task_response',
    relevance: 'task_response',
    response_relevance: 'task_response',
    ...SUMMARY_NESTED_ALIASES,
  },
};

export const WRITING_NORMALIZATION: NormalizationTable = {
  criteria: ['task_achievement', 'coherence', 'lexical_resource', 'grammatical_range'],
  scoreAliases: {
    task_response_score: 'task_achievement_score',
    task_score: 'task_achievement_score',
    coherence_and_cohesion_score: 'coherence_score',
    cohesion_score: 'coherence_score',
    ...LEXICAL_SCORE_ALIASES,
    ...GRAMMAR_SCORE_ALIASES,
  },
  feedbackAliases: {
    task_response_feedback: 'task_achievement_feedback',
    task_feedback: 'task_achievement_feedback',
    coherence_and_cohesion_feedback: 'coherence_feedback',
    cohesion_feedback: 'coherence_feedback',
    ...LEXICAL_FEEDBACK_ALIASES,
    ...GRAMMAR_FEEDBACK_ALIASES,
  },
  nestedAliases: {
    task_response: 'task_achievement',
    task: 'task_achievement',
    coherence_and_cohesion: 'coherence',
    cohesion: 'coherence',
    ...LEXICAL_NESTED_ALIASES,
    ...GRAMMAR_NESTED_ALIASES,
    ...SUMMARY_NESTED_ALIASES,
  },
};
