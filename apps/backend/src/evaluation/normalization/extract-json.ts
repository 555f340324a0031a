import { EvaluationFailedError } from '../evaluation.errors';
import { isRecord, type JsonRecord } from './normalize-keys';

const REASONING_BLOCK = /<think>[\s\S]*?<\/think>/g;
const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

/** Removes `<think>…</think>` reasoning blocks emitted by reasoning models. */
export const stripReasoning = (text: string): string => text.replace(REASONING_BLOCK, '').trim();

/** Returns the body of the first markdown code fence, or the trimmed text. */
export const unwrapCodeFence = (text: string): string => {
  const match = FENCED_BLOCK.exec(text);
  return match ? match[1].trim() : text.trim();
};

const tryParse = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

/**
 * Extracts the JSON object a chat model was asked for from its free-text
 * reply. Falls back to the outermost `{…}` span when prose surrounds it.
 */
export const extractJsonObject = (raw: string): JsonRecord => {
  const cleaned = unwrapCodeFence(stripReasoning(raw));
  if (!cleaned) {
    throw new EvaluationFailedError('EMPTY_RESPONSE', 'Model returned no JSON content', raw);
  }

  let parsed = tryParse(cleaned);
  if (!parsed.ok) {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start >= 0 && end > start) {
      parsed = tryParse(cleaned.slice(start, end + 1));
    }
  }

  if (!parsed.ok) {
    throw new EvaluationFailedError('INVALID_JSON', 'Model output is not valid JSON', raw);
  }
  if (!isRecord(parsed.value)) {
    throw new EvaluationFailedError('INVALID_JSON', 'Model output is not a JSON object', raw);
  }
  return parsed.value;
};
