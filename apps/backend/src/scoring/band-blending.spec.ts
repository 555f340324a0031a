import type { AudioMetrics } from '../audio/audio.types';
import type { ContentEvaluation } from '../evaluation/evaluation.types';
import { blendBands, computeWritingBand, pauseScore, rateScore, roundToHalf, scoreDelivery } from './band-blending';

const content = (coherence: number, lexical: number, grammar: number): ContentEvaluation => ({
  coherence: { score: coherence, feedback: '' },
  lexical_resource: { score: lexical, feedback: '' },
  grammatical_range: { score: grammar, feedback: '' },
  task_response: { score: 7, feedback: '' },
  overall_feedback: '',
});

const audio = (overrides: Partial<AudioMetrics> = {}): AudioMetrics => ({
  duration: 60,
  speechRate: 140,
  pauseRatio: 0.1,
  pronunciationConfidence: 0.8,
  longPauses: 0,
  ...overrides,
});

describe('band blending', () => {
  describe('rateScore', () => {
    it.each([
      [140, 9],
      [120, 9],
      [160, 9],
      [161, 7],
      [100, 7],
      [99, 5.5],
      [200, 5.5],
      [79, 4],
      [201, 4],
    ])('should score %s WPM as %s', (wpm, band) => {
      expect(rateScore(wpm)).toBe(band);
    });
  });

  describe('pauseScore', () => {
    it.each([
      [0.1, 9],
      [0.15, 7],
      [0.25, 5.5],
      [0.4, 4],
    ])('should score a pause ratio of %s as %s', (ratio, band) => {
      expect(pauseScore(ratio)).toBe(band);
    });
  });

  describe('scoreDelivery', () => {
    it('should give full audio fluency for a steady pace with few pauses', () => {
      expect(scoreDelivery(audio())).toEqual({ rateScore: 9, pauseScore: 9, audioFluency: 9, pronunciation: 8 });
    });

    it('should treat a zero-length recording as silence', () => {
      expect(scoreDelivery(audio({ duration: 0 }))).toEqual({
        rateScore: 4,
        pauseScore: 4,
        audioFluency: 4,
        pronunciation: 4,
      });
    });

    it('should treat non-finite metrics as silence', () => {
      expect(scoreDelivery(audio({ speechRate: Number.NaN })).audioFluency).toBe(4);
    });

    it('should clamp pronunciation to the band range', () => {
      expect(scoreDelivery(audio({ pronunciationConfidence: 1 })).pronunciation).toBe(9);
      expect(scoreDelivery(audio({ pronunciationConfidence: 0.2 })).pronunciation).toBe(4);
    });
  });

  describe('blendBands', () => {
    it('should average audio fluency with coherence and round to half bands', () => {
      expect(blendBands(content(7, 6.5, 6), audio())).toEqual({
        overallBand: 7,
        fluencyCoherence: 8,
        lexicalResource: 6.5,
        grammaticalRange: 6,
        pronunciation: 8,
      });
    });

    it('should pull fluency down when the recording is silent', () => {
      const band = blendBands(content(9, 9, 9), audio({ duration: 0 }));

      expect(band.fluencyCoherence).toBe(6.5);
      expect(band.pronunciation).toBe(4);
      expect(band.overallBand).toBe(7);
    });

    it('should round a tied overall average to the even half step', () => {
      expect(blendBands(content(7, 6.5, 6.5), audio({ pronunciationConfidence: 0.6 })).overallBand).toBe(7);
      expect(blendBands(content(5, 6, 6), audio({ pronunciationConfidence: 0.6 })).overallBand).toBe(6);
    });

    it('should keep every band between 4 and 9', () => {
      const band = blendBands(content(1, 2, 0), audio({ duration: 0 }));

      expect(band).toEqual({
        overallBand: 4,
        fluencyCoherence: 4,
        lexicalResource: 4,
        grammaticalRange: 4,
        pronunciation: 4,
      });
    });
  });

  describe('computeWritingBand', () => {
    const writing = (scores: [number, number, number, number]) => ({
      task_achievement: { score: scores[0], feedback: '' },
      coherence: { score: scores[1], feedback: '' },
      lexical_resource: { score: scores[2], feedback: '' },
      grammatical_range: { score: scores[3], feedback: '' },
      overall_feedback: '',
    });

    it('should average the four criteria', () => {
      expect(computeWritingBand(writing([8, 7, 6, 7]))).toBe(7);
    });

    it('should round the average to the nearest half band', () => {
      expect(computeWritingBand(writing([6, 6, 6, 6.5]))).toBe(6);
      expect(computeWritingBand(writing([6, 6.5, 6.5, 6.5]))).toBe(6.5);
    });

    it('should send a .25 average down to the even half step', () => {
      expect(computeWritingBand(writing([6, 6, 6.5, 6.5]))).toBe(6);
    });
  });

  it('should round ties to the even half step', () => {
    expect(roundToHalf(6.25)).toBe(6);
    expect(roundToHalf(6.75)).toBe(7);
    expect(roundToHalf(5.25)).toBe(5);
    expect(roundToHalf(6.74)).toBe(6.5);
    expect(roundToHalf(6.76)).toBe(7);
  });
});
