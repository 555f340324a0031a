export type AudioMetrics = {
  /** Seconds. */
  duration: number;
  /** Words per minute. */
  speechRate: number;
  /** Share of the recording without speech, 0-1. */
  pauseRatio: number;
  /** Mean transcription confidence, 0-1. */
  pronunciationConfidence: number;
  /** Silent gaps of at least two seconds. */
  longPauses: number;
};

export type WordTiming = {
  text: string;
  start: number;
  end: number;
  probability: number;
};

export type TranscriptionSample = {
  transcript: string;
  words: WordTiming[];
  duration: number;
};
