import { Logger } from '@nestjs/common';
import { EvaluationFailedError } from '../evaluation.errors';
import type {
  ContentEvaluation,
  EnhancedReview,
  EvaluationKind,
  EvaluationResults,
  SpeakingInput,
  WritingEnhancedReview,
  WritingEvaluation,
  WritingInput,
} from '../evaluation.types';
import type { JsonRecord } from '../normalization/normalize-keys';
import { EVALUATION_PROFILES, type EvaluationProfile } from '../profiles/evaluation.profiles';
import { buildSpeakingUserPrompt, buildWritingUserPrompt } from '../prompts/evaluation.user.template';
import { loadSystemPrompt } from '../prompts/system-prompts';
import { validateEvaluation } from '../utils/schema-validate';
import type {
  EvaluationProvider,
  ProviderDescriptor,
  ProviderHealth,
  ProviderResult,
} from './provider.interface';

export type CompletionRequest = {
  profile: EvaluationProfile;
  systemPrompt: string;
  userPrompt: string;
};

export type Completion = {
  payload: JsonRecord;
  rawText: string;
};

/**
 * Shared evaluation flow: build prompts from the profile, ask the model, and
 * validate whatever `complete` hands back against the profile's schema.
 */
export abstract class BaseEvaluationProvider implements EvaluationProvider {
  protected abstract readonly logger: Logger;

  abstract describe(): ProviderDescriptor;

  abstract healthCheck(): Promise<ProviderHealth>;

  protected abstract complete(request: CompletionRequest): Promise<Completion>;

  evaluateSpeaking(input: SpeakingInput): Promise<ProviderResult<ContentEvaluation>> {
    return this.run('speaking-basic', buildSpeakingUserPrompt(input));
  }

  evaluateSpeakingEnhanced(input: SpeakingInput): Promise<ProviderResult<EnhancedReview>> {
    return this.run('speaking-enhanced', buildSpeakingUserPrompt(input));
  }

  evaluateWriting(input: WritingInput): Promise<ProviderResult<WritingEvaluation>> {
    return this.run('writing-basic', buildWritingUserPrompt(input));
  }

  evaluateWritingEnhanced(input: WritingInput): Promise<ProviderResult<WritingEnhancedReview>> {
    return this.run('writing-enhanced', buildWritingUserPrompt(input));
  }

  protected buildSystemPrompt(profile: EvaluationProfile): string {
    return loadSystemPrompt(profile);
  }

  private async run<K extends EvaluationKind>(
    kind: K,
    userPrompt: string,
  ): Promise<ProviderResult<EvaluationResults[K]>> {
    const profile = EVALUATION_PROFILES[kind];
    const { modelName } = this.describe();
    this.logger.log(`Evaluating ${kind}: model=${modelName}, prompt_len=${userPrompt.length}`);

    const { payload, rawText } = await this.complete({
      profile,
      systemPrompt: this.buildSystemPrompt(profile),
      userPrompt,
    });

    const validation = validateEvaluation(kind, payload);
    if (!validation.valid) {
      this.logger.warn(`Schema validation failed for ${kind}: ${validation.errors}`);
      throw new EvaluationFailedError(
        'SCHEMA_INVALID',
        `Evaluation does not match the ${kind} schema: ${validation.errors}`,
        rawText,
      );
    }

    return { result: validation.value, rawResponse: rawText };
  }
}
