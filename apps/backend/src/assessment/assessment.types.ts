import type { AudioMetrics, WordTiming } from '../audio/audio.types';
import type { EvaluationFailureReason } from '../evaluation/evaluation.errors';
import type {
  CallMetadata,
  ContentEvaluation,
  EnhancedReview,
  SpeakingPart,
  WritingEnhancedReview,
  WritingEvaluation,
  WritingTaskType,
} from '../evaluation/evaluation.types';
import type {
  CombinedBand,
  DeliveryScores,
  FillerCounts,
  ReadAloudFeedback,
  WritingQuality,
} from '../scoring/scoring.types';

export type SpeakingAssessmentRequest = {
  sessionId?: number;
  questionText: string;
  partNumber: SpeakingPart;
  transcript: string;
  topic?: string;
  source?: string;
  referenceAnswer?: string;
  enhanced?: boolean;
  /** Precomputed delivery metrics; takes precedence over word timings. */
  audioMetrics?: AudioMetrics;
  words?: WordTiming[];
  duration?: number;
};

export type ScoredSpeakingAssessment = {
  status: 'scored';
  sessionId: number;
  attemptId: number;
  evaluation: ContentEvaluation | EnhancedReview;
  combinedBand: CombinedBand;
  delivery: DeliveryScores;
  audioMetrics: AudioMetrics;
  fillers: FillerCounts;
  meta: CallMetadata;
};

/** Content scoring failed; only the audio side of the attempt is reported. */
export type ContentFailedSpeakingAssessment = {
  status: 'content_failed';
  failureReason: EvaluationFailureReason | 'PROVIDER_UNAVAILABLE';
  message: string;
  delivery: DeliveryScores;
  audioMetrics: AudioMetrics;
  fillers: FillerCounts;
};

export type SpeakingAssessment = ScoredSpeakingAssessment | ContentFailedSpeakingAssessment;

export type WritingAssessmentRequest = {
  sessionId?: number;
  promptText: string;
  essayText: string;
  taskType: WritingTaskType;
  chartData?: string;
  enhanced?: boolean;
};

export type WritingAssessment = {
  sessionId: number;
  attemptId: number;
  evaluation: WritingEvaluation | WritingEnhancedReview;
  overallBand: number;
  quality: WritingQuality;
  meta: CallMetadata;
};

export type ReadAloudRequest = {
  referenceText: string;
  transcript: string;
  audioMetrics?: AudioMetrics;
  words?: WordTiming[];
  duration?: number;
};

export type ReadAloudAssessment = {
  band: number;
  wordErrorRate: number;
  feedback: ReadAloudFeedback;
  audioMetrics: AudioMetrics;
};
