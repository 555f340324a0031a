export type DeliveryScores = {
  rateScore: number;
  pauseScore: number;
  audioFluency: number;
  pronunciation: number;
};

export type CombinedBand = {
  overallBand: number;
  fluencyCoherence: number;
  lexicalResource: number;
  grammaticalRange: number;
  pronunciation: number;
};

export type FillerCounts = Record<string, number>;

export type WritingQuality = {
  wordCount: number;
  minWords: number;
  meetsMinimum: boolean;
  isEmpty: boolean;
};

export type ReadAloudFeedback = {
  accuracy: string;
  speechRate: string;
  pauses: string;
  pronunciation: string;
};
