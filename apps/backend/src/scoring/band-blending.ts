import type { AudioMetrics } from '../audio/audio.types';
import type { ContentEvaluation, WritingEvaluation } from '../evaluation/evaluation.types';
import { roundToHalf } from '../common/utils/round-to-half';
import type { CombinedBand, DeliveryScores } from './scoring.types';

export { roundToHalf };

export const MIN_BAND = 4;
export const MAX_BAND = 9;

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const toBand = (value: number): number => clamp(roundToHalf(value), MIN_BAND, MAX_BAND);

/** Speech rate in words per minute to a band; 120-160 WPM is the target range. */
export const rateScore = (wpm: number): number => {
  if (wpm >= 120 && wpm <= 160) return 9;
  if ((wpm >= 100 && wpm < 120) || (wpm > 160 && wpm <= 180)) return 7;
  if ((wpm >= 80 && wpm < 100) || (wpm > 180 && wpm <= 200)) return 5.5;
  return 4;
};

export const pauseScore = (pauseRatio: number): number => {
  if (pauseRatio < 0.15) return 9;
  if (pauseRatio < 0.25) return 7;
  if (pauseRatio < 0.4) return 5.5;
  return 4;
};

const isDegenerate = (audio: AudioMetrics): boolean =>
  !(audio.duration > 0) ||
  !Number.isFinite(audio.duration) ||
  !Number.isFinite(audio.speechRate) ||
  !Number.isFinite(audio.pauseRatio) ||
  !Number.isFinite(audio.pronunciationConfidence);

/**
 * The audio-only half of the blend. Degenerate metrics score as silence
 * (no words, all pause, zero confidence).
 */
export const scoreDelivery = (audio: AudioMetrics): DeliveryScores => {
  const degenerate = isDegenerate(audio);
  const wpm = degenerate ? 0 : audio.speechRate;
  const pause = degenerate ? 1 : audio.pauseRatio;
  const confidence = degenerate ? 0 : audio.pronunciationConfidence;

  const rate = rateScore(wpm);
  const pauses = pauseScore(pause);
  return {
    rateScore: rate,
    pauseScore: pauses,
    audioFluency: (rate + pauses) / 2,
    pronunciation: clamp(confidence * 10, MIN_BAND, MAX_BAND),
  };
};

/**
 * Combines content scores with delivery metrics into the four speaking
 * criteria. Fluency blends audio fluency and coherence equally; lexical and
 * grammar come from the content evaluation; pronunciation from the audio.
 */
export const blendBands = (content: ContentEvaluation, audio: AudioMetrics): CombinedBand => {
  const delivery = scoreDelivery(audio);
  const fluencyCoherence = 0.5 * delivery.audioFluency + 0.5 * content.coherence.score;
  const lexical = content.lexical_resource.score;
  const grammar = content.grammatical_range.score;

  return {
    overallBand: toBand((fluencyCoherence + lexical + grammar + delivery.pronunciation) / 4),
    fluencyCoherence: toBand(fluencyCoherence),
    lexicalResource: toBand(lexical),
    grammaticalRange: toBand(grammar),
    pronunciation: toBand(delivery.pronunciation),
  };
};

export const computeWritingBand = (evaluation: WritingEvaluation): number =>
  roundToHalf(
    (evaluation.task_achievement.score +
      evaluation.coherence.score +
      evaluation.lexical_resource.score +
      evaluation.grammatical_range.score) /
      4,
  );
