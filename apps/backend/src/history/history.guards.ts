import type {
  GrammarCorrection,
  PronunciationWarning,
  VocabularyUpgrade,
  WritingTaskType,
} from '../evaluation/evaluation.types';
import { isRecord } from '../evaluation/normalization/normalize-keys';
import { SESSION_MODES, type SessionMode } from './history.types';

export const isString = (value: unknown): value is string => typeof value === 'string';

export const isGrammarCorrection = (value: unknown): value is GrammarCorrection =>
  isRecord(value) &&
  isString(value.original) &&
  isString(value.corrected) &&
  isString(value.explanation);

export const isVocabularyUpgrade = (value: unknown): value is VocabularyUpgrade =>
  isRecord(value) &&
  isString(value.basic_word) &&
  Array.isArray(value.alternatives) &&
  value.alternatives.every(isString) &&
  isString(value.example);

export const isPronunciationWarning = (value: unknown): value is PronunciationWarning =>
  isRecord(value) && isString(value.word) && isString(value.phonetic) && isString(value.tip);

export const isSessionMode = (value: unknown): value is SessionMode =>
  SESSION_MODES.some((mode) => mode === value);

export const isWritingTaskType = (value: unknown): value is WritingTaskType => value === 1 || value === 2;

/** Parses a JSON list column, keeping only items that pass `guard`. */
export const parseList = <T>(value: string | null, guard: (item: unknown) => item is T): T[] => {
  if (!value) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter(guard) : [];
  } catch {
    return [];
  }
};
