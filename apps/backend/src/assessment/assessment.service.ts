import { Injectable, Logger } from '@nestjs/common';
import { AudioMetricsService, SILENT_METRICS } from '../audio/audio-metrics.service';
import type { AudioMetrics } from '../audio/audio.types';
import { ValidationError } from '../common/errors';
import { EvaluationFailedError, ProviderUnavailableError } from '../evaluation/evaluation.errors';
import { EvaluationService } from '../evaluation/evaluation.service';
import type {
  ContentEvaluation,
  EnhancedReview,
  EvaluationOutcome,
  SpeakingInput,
  WritingEnhancedReview,
  WritingEvaluation,
  WritingInput,
} from '../evaluation/evaluation.types';
import { HistoryService } from '../history/history.service';
import type { SessionMode } from '../history/history.types';
import { blendBands, computeWritingBand, scoreDelivery } from '../scoring/band-blending';
import { detectFillers } from '../scoring/filler-detector';
import {
  estimateReadAloudBand,
  normalizeReadAloudText,
  readAloudFeedback,
  wordErrorRate,
} from '../scoring/read-aloud';
import type { FillerCounts } from '../scoring/scoring.types';
import { checkWritingQuality } from '../scoring/writing-quality';
import type {
  ReadAloudAssessment,
  ReadAloudRequest,
  SpeakingAssessment,
  SpeakingAssessmentRequest,
  WritingAssessment,
  WritingAssessmentRequest,
} from './assessment.types';

/**
 * Runs one practice attempt end to end: delivery metrics, content
 * evaluation, band blending and persistence.
 */
@Injectable()
export class AssessmentService {
  private readonly logger = new Logger(AssessmentService.name);

  constructor(
    private readonly evaluationService: EvaluationService,
    private readonly audioMetricsService: AudioMetricsService,
    private readonly historyService: HistoryService,
  ) {}

  async assessSpeaking(request: SpeakingAssessmentRequest): Promise<SpeakingAssessment> {
    if (request.sessionId !== undefined) {
      this.historyService.getSession(request.sessionId);
    }

    const audioMetrics = this.resolveAudioMetrics(request);
    const delivery = scoreDelivery(audioMetrics);
    const fillers = detectFillers(request.transcript);
    const input: SpeakingInput = {
      questionText: request.questionText,
      partNumber: request.partNumber,
      transcript: request.transcript,
      referenceAnswer: request.referenceAnswer,
    };

    let outcome: EvaluationOutcome<ContentEvaluation | EnhancedReview>;
    try {
      outcome = await this.evaluateSpeaking(input, Boolean(request.enhanced));
    } catch (error) {
      if (error instanceof EvaluationFailedError || error instanceof ProviderUnavailableError) {
        this.logger.warn(`Content scoring failed, returning delivery metrics only: ${error.message}`);
        return {
          status: 'content_failed',
          failureReason: error instanceof EvaluationFailedError ? error.reason : 'PROVIDER_UNAVAILABLE',
          message: error.message,
          delivery,
          audioMetrics,
          fillers,
        };
      }
      throw error;
    }

    const evaluation = outcome.result;
    const combinedBand = blendBands(evaluation, audioMetrics);
    const enhanced = 'grammar_corrections' in evaluation ? evaluation : undefined;
    const sessionId = request.sessionId ?? this.openSession('practice');

    const attemptId = this.historyService.saveAttempt({
      sessionId,
      part: request.partNumber,
      topic: request.topic ?? '',
      questionText: request.questionText,
      transcript: request.transcript,
      duration: audioMetrics.duration,
      overallBand: combinedBand.overallBand,
      fluencyCoherence: combinedBand.fluencyCoherence,
      lexicalResource: combinedBand.lexicalResource,
      grammaticalRange: combinedBand.grammaticalRange,
      pronunciation: combinedBand.pronunciation,
      speechRate: audioMetrics.speechRate,
      pauseRatio: audioMetrics.pauseRatio,
      pronunciationConfidence: audioMetrics.pronunciationConfidence,
      examinerFeedback: evaluation.overall_feedback,
      grammarCorrections: enhanced?.grammar_corrections ?? [],
      vocabularyUpgrades: enhanced?.vocabulary_upgrades ?? [],
      improvementTips: enhanced?.improvement_priorities ?? [],
      strengths: enhanced?.strengths ?? [],
      pronunciationWarnings: enhanced?.pronunciation_warnings ?? [],
      referenceAnswer: request.referenceAnswer ?? '',
      source: request.source ?? '',
    });
    this.logger.log(`Scored speaking attempt ${attemptId}: band ${combinedBand.overallBand}`);

    return {
      status: 'scored',
      sessionId,
      attemptId,
      evaluation,
      combinedBand,
      delivery,
      audioMetrics,
      fillers,
      meta: outcome.meta,
    };
  }

  async assessWriting(request: WritingAssessmentRequest): Promise<WritingAssessment> {
    const quality = checkWritingQuality(request.essayText, request.taskType);
    if (quality.isEmpty) {
      throw new ValidationError('Essay is empty', [{ field: 'essayText', message: 'Essay must contain text' }]);
    }
    if (request.sessionId !== undefined) {
      this.historyService.getSession(request.sessionId);
    }
    if (!quality.meetsMinimum) {
      this.logger.log(`Essay below minimum length: ${quality.wordCount}/${quality.minWords} words`);
    }

    const input: WritingInput = {
      promptText: request.promptText,
      essayText: request.essayText,
      taskType: request.taskType,
      chartData: request.chartData,
    };
    const outcome = await this.evaluateWriting(input, Boolean(request.enhanced));
    const evaluation = outcome.result;
    const overallBand = computeWritingBand(evaluation);
    const enhanced = 'paragraph_feedback' in evaluation ? evaluation : undefined;
    const sessionId = request.sessionId ?? this.openSession('writing');

    const attemptId = this.historyService.saveWritingAttempt({
      sessionId,
      taskType: request.taskType,
      promptText: request.promptText,
      essayText: request.essayText,
      wordCount: quality.wordCount,
      overallBand,
      taskAchievement: evaluation.task_achievement.score,
      coherence: evaluation.coherence.score,
      lexicalResource: evaluation.lexical_resource.score,
      grammaticalRange: evaluation.grammatical_range.score,
      examinerFeedback: evaluation.overall_feedback,
      grammarCorrections: enhanced?.grammar_corrections ?? [],
      vocabularyUpgrades: enhanced?.vocabulary_upgrades ?? [],
      paragraphFeedback: enhanced?.paragraph_feedback ?? [],
      improvementTips: enhanced?.improvement_priorities ?? [],
      strengths: enhanced?.strengths ?? [],
    });
    this.logger.log(`Scored writing attempt ${attemptId}: band ${overallBand}`);

    return { sessionId, attemptId, evaluation, overallBand, quality, meta: outcome.meta };
  }

  /** Scores reading a given script aloud. Nothing is evaluated by a model or persisted. */
  assessReadAloud(request: ReadAloudRequest): ReadAloudAssessment {
    const reference = normalizeReadAloudText(request.referenceText);
    if (!reference) {
      throw new ValidationError('Reference text is empty', [
        { field: 'referenceText', message: 'Reference text must contain words' },
      ]);
    }
    const hypothesis = normalizeReadAloudText(request.transcript);
    if (!hypothesis) {
      throw new ValidationError('No speech detected', [{ field: 'transcript', message: 'Transcript must contain words' }]);
    }

    const audioMetrics = this.resolveAudioMetrics(request);
    const wer = wordErrorRate(reference, hypothesis);
    const band = estimateReadAloudBand(wer, audioMetrics);
    this.logger.log(`Scored read-aloud attempt: band ${band}, WER ${wer.toFixed(3)}`);

    return { band, wordErrorRate: wer, feedback: readAloudFeedback(wer, audioMetrics), audioMetrics };
  }

  detectFillers(transcript: string): { fillers: FillerCounts; total: number } {
    const fillers = detectFillers(transcript);
    const total = Object.values(fillers).reduce((sum, count) => sum + count, 0);
    return { fillers, total };
  }

  private resolveAudioMetrics(
    request: Pick<SpeakingAssessmentRequest, 'transcript' | 'audioMetrics' | 'words' | 'duration'>,
  ): AudioMetrics {
    if (request.audioMetrics) {
      return this.audioMetricsService.validate(request.audioMetrics);
    }
    if (request.words && request.duration !== undefined) {
      return this.audioMetricsService.fromWordTimings({
        transcript: request.transcript,
        words: request.words,
        duration: request.duration,
      });
    }
    return { ...SILENT_METRICS };
  }

  private evaluateSpeaking(
    input: SpeakingInput,
    enhanced: boolean,
  ): Promise<EvaluationOutcome<ContentEvaluation | EnhancedReview>> {
    return enhanced
      ? this.evaluationService.evaluate('speaking-enhanced', input)
      : this.evaluationService.evaluate('speaking-basic', input);
  }

  private evaluateWriting(
    input: WritingInput,
    enhanced: boolean,
  ): Promise<EvaluationOutcome<WritingEvaluation | WritingEnhancedReview>> {
    return enhanced
      ? this.evaluationService.evaluate('writing-enhanced', input)
      : this.evaluationService.evaluate('writing-basic', input);
  }

  private openSession(mode: SessionMode): number {
    return this.historyService.createSession(mode).id;
  }
}
