import type { AliasTable, NormalizationTable } from './alias-tables';

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const applyAliases = (payload: JsonRecord, aliases: AliasTable): void => {
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in payload && !(canonical in payload)) {
      payload[canonical] = payload[alias];
      delete payload[alias];
    }
  }
};

const takeKey = (payload: JsonRecord, key: string, fallback: unknown): unknown => {
  if (!(key in payload)) {
    return fallback;
  }
  const value = payload[key];
  delete payload[key];
  return value;
};

/**
 * Reshapes a loosely keyed model response into the nested criterion layout:
 * aliases are resolved without overwriting canonical keys, flat
 * `<criterion>_score` / `<criterion>_feedback` pairs become
 * `{ score, feedback }` objects, bare numbers are wrapped and missing
 * criteria default to a zero score. Enrichment lists are left as they are;
 * schema validation decides whether their items are acceptable.
 *
 * Pure: the input and its nested objects are never mutated.
 */
export const normalizeEvaluationKeys = (raw: JsonRecord, table: NormalizationTable): JsonRecord => {
  const payload: JsonRecord = { ...raw };

  applyAliases(payload, table.scoreAliases);
  applyAliases(payload, table.feedbackAliases);
  applyAliases(payload, table.nestedAliases);

  for (const criterion of table.criteria) {
    const scoreKey = `${criterion}_score`;
    const feedbackKey = `${criterion}_feedback`;
    const current = payload[criterion];

    if (scoreKey in payload) {
      payload[criterion] = {
        score: takeKey(payload, scoreKey, 0),
        feedback: takeKey(payload, feedbackKey, ''),
      };
    } else if (typeof current === 'number') {
      payload[criterion] = { score: current, feedback: '' };
    } else if (isRecord(current)) {
      payload[criterion] = {
        ...current,
        score: 'score' in current ? current.score : 0,
        feedback: 'feedback' in current ? current.feedback : '',
      };
    } else {
      payload[criterion] = { score: 0, feedback: '' };
    }
  }

  if (typeof payload.overall_feedback !== 'string') {
    payload.overall_feedback = '';
  }

  return payload;
};
