import { Injectable } from '@nestjs/common';
import { MalformedAudioInputError } from './audio.errors';
import type { AudioMetrics, TranscriptionSample, WordTiming } from './audio.types';

export const LONG_PAUSE_SECONDS = 2;

export const SILENT_METRICS: AudioMetrics = {
  duration: 0,
  speechRate: 0,
  pauseRatio: 1,
  pronunciationConfidence: 0,
  longPauses: 0,
};

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const countWords = (text: string): number => {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
};

type Span = { start: number; end: number };

const mergeSpans = (words: WordTiming[], duration: number): Span[] => {
  const spans = words
    .map((word) => ({
      start: Math.min(Math.max(word.start, 0), duration),
      end: Math.min(Math.max(word.end, 0), duration),
    }))
    .filter((span) => span.end > span.start)
    .sort((a, b) => a.start - b.start);

  const merged: Span[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
};

@Injectable()
export class AudioMetricsService {
  /**
   * Derives delivery metrics from a transcription with word-level timings.
   * A recording without a usable duration yields {@link SILENT_METRICS}.
   */
  fromWordTimings(sample: TranscriptionSample): AudioMetrics {
    const { duration } = sample;
    if (!Number.isFinite(duration) || duration <= 0) {
      return { ...SILENT_METRICS };
    }

    const words = sample.words.filter(
      (word) => Number.isFinite(word.start) && Number.isFinite(word.end) && Number.isFinite(word.probability),
    );
    const spans = mergeSpans(words, duration);
    const speechSeconds = spans.reduce((total, span) => total + (span.end - span.start), 0);

    let longPauses = 0;
    let cursor = 0;
    for (const span of spans) {
      if (span.start - cursor >= LONG_PAUSE_SECONDS) {
        longPauses += 1;
      }
      cursor = span.end;
    }
    if (spans.length > 0 && duration - cursor >= LONG_PAUSE_SECONDS) {
      longPauses += 1;
    }

    const confidence = words.length
      ? words.reduce((total, word) => total + word.probability, 0) / words.length
      : 0;

    return {
      duration: round(duration, 2),
      speechRate: round(countWords(sample.transcript) / (duration / 60), 1),
      pauseRatio: round(Math.min(Math.max(1 - speechSeconds / duration, 0), 1), 3),
      pronunciationConfidence: round(Math.min(Math.max(confidence, 0), 1), 3),
      longPauses,
    };
  }

  /** Rejects metrics outside their domain. Zero duration is allowed. */
  validate(metrics: AudioMetrics): AudioMetrics {
    const problems: string[] = [];
    const nonNegative: Array<keyof AudioMetrics> = ['duration', 'speechRate', 'longPauses'];
    const ratios: Array<keyof AudioMetrics> = ['pauseRatio', 'pronunciationConfidence'];

    for (const key of [...nonNegative, ...ratios]) {
      if (!Number.isFinite(metrics[key])) {
        problems.push(`${key} must be a finite number`);
      }
    }
    for (const key of nonNegative) {
      if (metrics[key] < 0) {
        problems.push(`${key} must not be negative`);
      }
    }
    for (const key of ratios) {
      if (metrics[key] < 0 || metrics[key] > 1) {
        problems.push(`${key} must be between 0 and 1`);
      }
    }
    if (!Number.isInteger(metrics.longPauses)) {
      problems.push('longPauses must be an integer');
    }

    if (problems.length) {
      throw new MalformedAudioInputError(`Malformed audio metrics: ${problems.join('; ')}`);
    }
    return metrics;
  }
}
