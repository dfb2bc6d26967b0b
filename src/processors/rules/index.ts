import { checkTvlDrop } from './tvlDrop.js';
import { checkApyLow } from './apyLow.js';
import { checkUtilizationHigh } from './utilizationHigh.js';
import type { ThresholdRule } from './types.js';

// Independent of each other; order only affects the order of results
export const DEFAULT_RULES: readonly ThresholdRule[] = [checkTvlDrop, checkApyLow, checkUtilizationHigh];

export { checkTvlDrop, checkApyLow, checkUtilizationHigh };
export type { RuleContext, ThresholdRule } from './types.js';
