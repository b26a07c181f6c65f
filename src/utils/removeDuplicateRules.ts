import { conditionString, type Rule } from '../rules/model.js';

/**
 * Keeps the first rule for every condition. Later rules with the same
 * condition can never match, whatever their action.
 */
export const removeDuplicateRules = <T extends Rule>(rules: readonly T[]): T[] => {
  const seenConditions = new Set<string>();
  const finalRules: T[] = [];

  for (const rule of rules) {
    const condition = conditionString(rule);
    if (seenConditions.has(condition)) continue;
    seenConditions.add(condition);
    finalRules.push(rule);
  }

  return finalRules;
};
