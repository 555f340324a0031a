import type { AudioMetrics } from '../audio/audio.types';
import { estimateReadAloudBand, normalizeReadAloudText, readAloudFeedback, wordErrorRate } from './read-aloud';

const audio = (overrides: Partial<AudioMetrics> = {}): AudioMetrics => ({
  duration: 60,
  speechRate: 140,
  pauseRatio: 0.1,
  pronunciationConfidence: 0.8,
  longPauses: 0,
  ...overrides,
});

describe('normalizeReadAloudText', () => {
  it('should expand contractions and drop punctuation', () => {
    expect(normalizeReadAloudText("I'm sure it's FINE, don't worry!")).toBe('i am sure it is fine do not worry');
  });

  it('should collapse whitespace left by removed punctuation', () => {
    expect(normalizeReadAloudText("  She's  here;  let's\tgo. ")).toBe('she is here let us go');
  });

  it('should strip apostrophes that are not contractions', () => {
    expect(normalizeReadAloudText("The teacher's book")).toBe('the teachers book');
  });
});

describe('wordErrorRate', () => {
  const reference = 'the cat sat on the mat';

  it('should be zero for an exact reading', () => {
    expect(wordErrorRate(reference, reference)).toBe(0);
  });

  it('should count a deletion', () => {
    expect(wordErrorRate(reference, 'the cat sat on mat')).toBeCloseTo(1 / 6);
  });

  it('should count a substitution', () => {
    expect(wordErrorRate(reference, 'the dog sat on the mat')).toBeCloseTo(1 / 6);
  });

  it('should count an insertion', () => {
    expect(wordErrorRate(reference, 'the cat sat on the red mat')).toBeCloseTo(1 / 6);
  });

  it('should be one when nothing was read', () => {
    expect(wordErrorRate(reference, '')).toBe(1);
  });

  it('should exceed one when insertions outnumber the reference', () => {
    expect(wordErrorRate('yes', 'yes yes yes')).toBe(2);
  });

  it('should handle an empty reference', () => {
    expect(wordErrorRate('', '')).toBe(0);
    expect(wordErrorRate('', 'hello')).toBe(1);
  });
});

describe('estimateReadAloudBand', () => {
  it('should give the top band for a perfect, fluent, clear reading', () => {
    expect(estimateReadAloudBand(0, audio({ pronunciationConfidence: 0.95 }))).toBe(9);
  });

  it('should weight accuracy, fluency and pronunciation 3:4:3', () => {
    // 0.3 * 4.5 + 0.4 * 9 + 0.3 * 8 = 7.35
    expect(estimateReadAloudBand(0.5, audio())).toBe(7.5);
  });

  it('should floor accuracy at zero when the error rate exceeds one', () => {
    // 0.3 * 0 + 0.4 * 9 + 0.3 * 8 = 6
    expect(estimateReadAloudBand(1.5, audio())).toBe(6);
  });

  it('should clamp to the lowest band', () => {
    expect(estimateReadAloudBand(1, audio({ speechRate: 50, pauseRatio: 0.6, pronunciationConfidence: 0.2 }))).toBe(4);
  });

  it('should score degenerate audio as silence', () => {
    // 0.3 * 9 + 0.4 * 4 + 0.3 * 4 = 5.5
    expect(estimateReadAloudBand(0, audio({ duration: 0 }))).toBe(5.5);
  });
});

describe('readAloudFeedback', () => {
  it.each([
    [0.04, 'Excellent: 4% word error rate.'],
    [0.1, 'Good: 10% word error rate. Minor deviations from the script.'],
    [0.2, 'Fair: 20% word error rate. Several words differ from the script.'],
    [0.3, 'Needs work: 30% word error rate. Many words differ from the script.'],
  ])('should grade accuracy for an error rate of %p', (wer, expected) => {
    expect(readAloudFeedback(wer, audio()).accuracy).toBe(expected);
  });

  it.each([
    [120, 'Natural pace at 120 WPM.'],
    [160, 'Natural pace at 160 WPM.'],
    [110, 'Slow at 110 WPM. Aim for 120-160 WPM.'],
    [161, 'Fast at 161 WPM. Slow down to 120-160 WPM for clarity.'],
  ])('should grade a speech rate of %p WPM', (speechRate, expected) => {
    expect(readAloudFeedback(0, audio({ speechRate })).speechRate).toBe(expected);
  });

  it.each([
    [0.14, 'Smooth delivery with few pauses (14% silence).'],
    [0.15, 'Some pauses (15% silence) but generally fluent.'],
    [0.25, 'Noticeable pauses (25% silence). Practise reading in longer phrases.'],
    [0.4, 'Frequent pauses (40% silence). Work on reducing hesitation.'],
  ])('should grade a pause ratio of %p', (pauseRatio, expected) => {
    expect(readAloudFeedback(0, audio({ pauseRatio })).pauses).toBe(expected);
  });

  it.each([
    [0.85, 'Clear and confident (confidence 85%).'],
    [0.84, 'Generally clear (confidence 84%).'],
    [0.7, 'Generally clear (confidence 70%).'],
    [0.69, 'Some unclear words (confidence 69%). Focus on enunciation.'],
    [0.5, 'Some unclear words (confidence 50%). Focus on enunciation.'],
    [0.49, 'Needs improvement (confidence 49%). Practise individual word clarity.'],
  ])('should grade a pronunciation confidence of %p', (pronunciationConfidence, expected) => {
    expect(readAloudFeedback(0, audio({ pronunciationConfidence })).pronunciation).toBe(expected);
  });
});
