import { MalformedAudioInputError } from './audio.errors';
import { AudioMetricsService, SILENT_METRICS } from './audio-metrics.service';

describe('AudioMetricsService', () => {
  let service: AudioMetricsService;

  beforeEach(() => {
    service = new AudioMetricsService();
  });

  describe('fromWordTimings', () => {
    it('should derive rate, pauses and confidence from word timings', () => {
      const metrics = service.fromWordTimings({
        transcript: 'one two three four five',
        duration: 10,
        words: [
          { text: 'one', start: 0.5, end: 1.0, probability: 0.9 },
          { text: 'two', start: 1.0, end: 1.5, probability: 0.8 },
          { text: 'three', start: 4.0, end: 4.5, probability: 0.7 },
          { text: 'four', start: 4.4, end: 5.0, probability: 1.0 },
          { text: 'five', start: 5.0, end: 6.0, probability: 0.6 },
        ],
      });

      expect(metrics).toEqual({
        duration: 10,
        speechRate: 30,
        pauseRatio: 0.7,
        pronunciationConfidence: 0.8,
        longPauses: 2,
      });
    });

    it('should clip word spans to the recording', () => {
      const metrics = service.fromWordTimings({
        transcript: 'hello',
        duration: 2,
        words: [{ text: 'hello', start: 1.5, end: 3.0, probability: 0.5 }],
      });

      expect(metrics.pauseRatio).toBe(0.75);
      expect(metrics.longPauses).toBe(0);
    });

    it('should return silent metrics for a zero-length recording', () => {
      expect(service.fromWordTimings({ transcript: '', duration: 0, words: [] })).toEqual(SILENT_METRICS);
    });

    it('should not count a trailing gap when nothing was said', () => {
      const metrics = service.fromWordTimings({ transcript: '', duration: 8, words: [] });

      expect(metrics).toEqual({
        duration: 8,
        speechRate: 0,
        pauseRatio: 1,
        pronunciationConfidence: 0,
        longPauses: 0,
      });
    });
  });

  describe('validate', () => {
    it('should accept metrics in range', () => {
      const metrics = { duration: 42, speechRate: 130, pauseRatio: 0.2, pronunciationConfidence: 0.9, longPauses: 1 };
      expect(service.validate(metrics)).toBe(metrics);
    });

    it('should list every problem', () => {
      const call = () =>
        service.validate({
          duration: -1,
          speechRate: 120,
          pauseRatio: 1.5,
          pronunciationConfidence: 0.5,
          longPauses: 1.5,
        });

      expect(call).toThrow(MalformedAudioInputError);
      expect(call).toThrow(
        'Malformed audio metrics: duration must not be negative; pauseRatio must be between 0 and 1; longPauses must be an integer',
      );
    });

    it('should reject non-finite values', () => {
      expect(() =>
        service.validate({ ...SILENT_METRICS, speechRate: Number.POSITIVE_INFINITY }),
      ).toThrow('Malformed audio metrics: speechRate must be a finite number');
    });
  });
});
