import type {
  GrammarCorrection,
  PronunciationWarning,
  VocabularyUpgrade,
  WritingTaskType,
} from '../evaluation/evaluation.types';

export const SESSION_MODES = ['practice', 'interview', 'mock_test', 'writing'] as const;

export type SessionMode = (typeof SESSION_MODES)[number];

export type SessionRecord = {
  id: number;
  createdAt: string;
  mode: SessionMode;
  overallBand: number;
  attemptCount: number;
};

export type SpeakingAttemptRecord = {
  id: number;
  sessionId: number;
  createdAt: string;
  part: number;
  topic: string;
  questionText: string;
  transcript: string;
  duration: number;
  overallBand: number;
  fluencyCoherence: number;
  lexicalResource: number;
  grammaticalRange: number;
  pronunciation: number;
  speechRate: number;
  pauseRatio: number;
  pronunciationConfidence: number;
  examinerFeedback: string;
  grammarCorrections: GrammarCorrection[];
  vocabularyUpgrades: VocabularyUpgrade[];
  improvementTips: string[];
  strengths: string[];
  pronunciationWarnings: PronunciationWarning[];
  referenceAnswer: string;
  source: string;
};

export type SpeakingAttemptInput = Omit<SpeakingAttemptRecord, 'id' | 'createdAt'>;

export type WritingAttemptRecord = {
  id: number;
  sessionId: number;
  createdAt: string;
  taskType: WritingTaskType;
  promptText: string;
  essayText: string;
  wordCount: number;
  overallBand: number;
  taskAchievement: number;
  coherence: number;
  lexicalResource: number;
  grammaticalRange: number;
  examinerFeedback: string;
  grammarCorrections: GrammarCorrection[];
  vocabularyUpgrades: VocabularyUpgrade[];
  paragraphFeedback: string[];
  improvementTips: string[];
  strengths: string[];
};

export type WritingAttemptInput = Omit<WritingAttemptRecord, 'id' | 'createdAt'>;

export type SessionAttempts = {
  session: SessionRecord;
  speaking: SpeakingAttemptRecord[];
  writing: WritingAttemptRecord[];
};

export type BandCriterion = 'fluencyCoherence' | 'lexicalResource' | 'grammaticalRange' | 'pronunciation';

export type BandTrendPoint = {
  timestamp: string;
  overallBand: number;
};

export type CriterionTrendPoint = { timestamp: string } & Record<BandCriterion, number>;

export type WeakAreas = Partial<Record<BandCriterion, number>>;

export type TrendDirection = 'improving' | 'declining' | 'stable' | 'insufficient data';

export type CriterionTrend = {
  avg: number;
  direction: TrendDirection;
};

export type DetailedWeaknesses = {
  grammarErrors: Array<{ original: string; corrected: string; count: number }>;
  basicWords: Array<{ word: string; count: number }>;
  criterionTrends: Partial<Record<BandCriterion, CriterionTrend>>;
  recurringTips: Array<{ tip: string; count: number }>;
};
