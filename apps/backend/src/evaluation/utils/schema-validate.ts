import Ajv, { type ValidateFunction } from 'ajv';
import { roundToHalf } from '../../common/utils/round-to-half';
import type { EvaluationKind, EvaluationResults } from '../evaluation.types';
import { isRecord } from '../normalization/normalize-keys';
import { EVALUATION_PROFILES } from '../profiles/evaluation.profiles';

// removeAdditional drops keys the models invent; useDefaults fills absent
// enrichment lists with [].
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, removeAdditional: 'all', useDefaults: true });

type ValidatorMap = { [K in EvaluationKind]: ValidateFunction<EvaluationResults[K]> };

const validators: ValidatorMap = {
  'speaking-basic': ajv.compile<EvaluationResults['speaking-basic']>(EVALUATION_PROFILES['speaking-basic'].schema),
  'speaking-enhanced': ajv.compile<EvaluationResults['speaking-enhanced']>(
    EVALUATION_PROFILES['speaking-enhanced'].schema,
  ),
  'writing-basic': ajv.compile<EvaluationResults['writing-basic']>(EVALUATION_PROFILES['writing-basic'].schema),
  'writing-enhanced': ajv.compile<EvaluationResults['writing-enhanced']>(
    EVALUATION_PROFILES['writing-enhanced'].schema,
  ),
};

export type SchemaValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string };

const snapCriterionScores = (payload: Record<string, unknown>, kind: EvaluationKind): void => {
  for (const criterion of EVALUATION_PROFILES[kind].criteria) {
    const entry = payload[criterion.key];
    if (isRecord(entry) && typeof entry.score === 'number') {
      entry.score = roundToHalf(entry.score);
    }
  }
};

/**
 * Validates a normalized payload against the schema of `kind`. Unknown keys
 * are stripped and criterion scores snapped to the nearest half band, both
 * in place.
 */
export const validateEvaluation = <K extends EvaluationKind>(
  kind: K,
  data: unknown,
): SchemaValidationResult<EvaluationResults[K]> => {
  const validate: ValidateFunction<EvaluationResults[K]> = validators[kind];
  if (validate(data)) {
    if (isRecord(data)) {
      snapCriterionScores(data, kind);
    }
    return { valid: true, value: data };
  }

  return {
    valid: false,
    errors: validate.errors ? ajv.errorsText(validate.errors, { separator: '; ' }) : 'Invalid schema',
  };
};
