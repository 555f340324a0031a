import { readFileSync } from 'fs';
import type { AudioMetrics } from '../audio/audio.types';
import { resolveAssetPath } from '../common/utils/asset-path';
import { clamp, MAX_BAND, MIN_BAND, roundToHalf, scoreDelivery } from './band-blending';
import type { ReadAloudFeedback } from './scoring.types';

type Contraction = [string, string];

let contractions: Contraction[] | undefined;

const isContraction = (value: unknown): value is Contraction =>
  Array.isArray(value) && value.length === 2 && typeof value[0] === 'string' && typeof value[1] === 'string';

const loadContractions = (): Contraction[] => {
  if (contractions) {
    return contractions;
  }
  const parsed: unknown = JSON.parse(readFileSync(resolveAssetPath('scoring', 'contractions.json'), 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every(isContraction)) {
    throw new Error('contractions.json must be a list of [contraction, expansion] pairs');
  }
  contractions = parsed;
  return contractions;
};

/**
 * Lowercases, expands contractions (in list order, as substrings), drops
 * punctuation and collapses whitespace.
 */
export const normalizeReadAloudText = (text: string): string => {
  let normalized = text.toLowerCase().trim();
  for (const [short, long] of loadContractions()) {
    normalized = normalized.replaceAll(short, long);
  }
  return normalized
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
};

const words = (text: string): string[] => text.split(/\s+/).filter((word) => word.length > 0);

/**
 * Word error rate: word-level edit distance over the reference length. Can
 * exceed 1 when the hypothesis inserts words. An empty reference scores 0
 * against an empty hypothesis and 1 otherwise.
 */
export const wordErrorRate = (reference: string, hypothesis: string): number => {
  const ref = words(reference);
  const hyp = words(hypothesis);
  if (ref.length === 0) {
    return hyp.length === 0 ? 0 : 1;
  }

  let previous = Array.from({ length: hyp.length + 1 }, (_, j) => j);
  for (let i = 1; i <= ref.length; i++) {
    const current = [i];
    for (let j = 1; j <= hyp.length; j++) {
      const substitution = previous[j - 1] + (ref[i - 1] === hyp[j - 1] ? 0 : 1);
      current.push(Math.min(substitution, previous[j] + 1, current[j - 1] + 1));
    }
    previous = current;
  }
  return previous[hyp.length] / ref.length;
};

/** Accuracy 30%, fluency 40%, pronunciation 30%, clamped to 4-9. */
export const estimateReadAloudBand = (wer: number, audio: AudioMetrics): number => {
  const delivery = scoreDelivery(audio);
  const accuracy = Math.max(0, 1 - wer) * 9;
  const raw = 0.3 * accuracy + 0.4 * delivery.audioFluency + 0.3 * delivery.pronunciation;
  return roundToHalf(clamp(raw, MIN_BAND, MAX_BAND));
};

const percent = (ratio: number): number => Math.round(ratio * 1000) / 10;

const accuracyNote = (wer: number): string => {
  const rate = `${percent(wer)}% word error rate`;
  if (wer < 0.05) return `Excellent: ${rate}.`;
  if (wer < 0.15) return `Good: ${rate}. Minor deviations from the script.`;
  if (wer < 0.3) return `Fair: ${rate}. Several words differ from the script.`;
  return `Needs work: ${rate}. Many words differ from the script.`;
};

const speechRateNote = (wpm: number): string => {
  const rate = Math.round(wpm);
  if (wpm >= 120 && wpm <= 160) return `Natural pace at ${rate} WPM.`;
  if (wpm < 120) return `Slow at ${rate} WPM. Aim for 120-160 WPM.`;
  return `Fast at ${rate} WPM. Slow down to 120-160 WPM for clarity.`;
};

const pauseNote = (pauseRatio: number): string => {
  const silence = `${Math.round(pauseRatio * 100)}% silence`;
  if (pauseRatio < 0.15) return `Smooth delivery with few pauses (${silence}).`;
  if (pauseRatio < 0.25) return `Some pauses (${silence}) but generally fluent.`;
  if (pauseRatio < 0.4) return `Noticeable pauses (${silence}). Practise reading in longer phrases.`;
  return `Frequent pauses (${silence}). Work on reducing hesitation.`;
};

const pronunciationNote = (confidence: number): string => {
  const level = `confidence ${Math.round(confidence * 100)}%`;
  if (confidence >= 0.85) return `Clear and confident (${level}).`;
  if (confidence >= 0.7) return `Generally clear (${level}).`;
  if (confidence >= 0.5) return `Some unclear words (${level}). Focus on enunciation.`;
  return `Needs improvement (${level}). Practise individual word clarity.`;
};

export const readAloudFeedback = (wer: number, audio: AudioMetrics): ReadAloudFeedback => ({
  accuracy: accuracyNote(wer),
  speechRate: speechRateNote(audio.speechRate),
  pauses: pauseNote(audio.pauseRatio),
  pronunciation: pronunciationNote(audio.pronunciationConfidence),
});
