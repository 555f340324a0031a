import type {
  ContentEvaluation,
  EnhancedReview,
  ProviderName,
  SpeakingInput,
  WritingEnhancedReview,
  WritingEvaluation,
  WritingInput,
} from '../evaluation.types';

export type ProviderDescriptor = {
  providerName: ProviderName;
  modelName: string;
};

export type ProviderHealth = {
  available: boolean;
  reason?: string;
};

export type ProviderResult<T> = {
  result: T;
  /** The model output as received, before extraction and normalization. */
  rawResponse: string;
};

export interface EvaluationProvider {
  describe(): ProviderDescriptor;
  healthCheck(): Promise<ProviderHealth>;
  evaluateSpeaking(input: SpeakingInput): Promise<ProviderResult<ContentEvaluation>>;
  evaluateSpeakingEnhanced(input: SpeakingInput): Promise<ProviderResult<EnhancedReview>>;
  evaluateWriting(input: WritingInput): Promise<ProviderResult<WritingEvaluation>>;
  evaluateWritingEnhanced(input: WritingInput): Promise<ProviderResult<WritingEnhancedReview>>;
}
