export const EVALUATION_PROVIDER = Symbol('EVALUATION_PROVIDER');
