import { SEARCH_LIMITS } from './constants';

export const SEARCH_RULES = {
  queryMinLength: 1,
  limitMin: 1,
  limitMax: SEARCH_LIMITS.max,
  limitDefault: SEARCH_LIMITS.default
} as const;
