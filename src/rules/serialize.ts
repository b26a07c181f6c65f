import { actionToken, conditionString, type Action, type Rule } from './model.js';
import type { StructuredRule } from './parseStructured.js';

export const renderAction = (action: Action): string => actionToken(action);

/** Canonical single-line text of a rule; parsing it gives back the same rule. */
export const renderRule = (rule: Rule): string => {
  switch (rule.type) {
    case 'simple':
      return [conditionString(rule), renderAction(rule.action), ...rule.extraParams].join(',');
    case 'logic':
      return `${conditionString(rule)},${renderAction(rule.action)}`;
    case 'match':
      return `MATCH,${renderAction(rule.action)}`;
  }
};

const toStructuredCondition = (condition: Rule): StructuredRule | string =>
  condition.type === 'simple'
    ? { type: condition.kind, payload: condition.payload }
    : `(${conditionString(condition)})`;

export const toStructured = (rule: Rule): StructuredRule => {
  switch (rule.type) {
    case 'simple':
      return {
        type: rule.kind,
        payload: rule.payload,
        action: renderAction(rule.action),
        ...(rule.extraParams.length ? { extra_params: [...rule.extraParams] } : {}),
      };
    case 'logic':
      return {
        type: rule.kind,
        action: renderAction(rule.action),
        conditions: rule.conditions.map(toStructuredCondition),
      };
    case 'match':
      return { type: 'MATCH', action: renderAction(rule.action) };
  }
};
