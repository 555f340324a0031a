import type { WritingTaskType } from '../evaluation/evaluation.types';
import { countWords, MIN_WORDS } from '../evaluation/prompts/evaluation.user.template';
import type { WritingQuality } from './scoring.types';

export const checkWritingQuality = (essayText: string, taskType: WritingTaskType): WritingQuality => {
  const wordCount = countWords(essayText);
  const minWords = MIN_WORDS[taskType];
  return {
    wordCount,
    minWords,
    meetsMinimum: wordCount >= minWords,
    isEmpty: wordCount === 0,
  };
};
