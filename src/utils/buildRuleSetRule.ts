import { actionFromToken, type SimpleRule } from '../rules/model.js';

export const buildRuleSetRule = (providerName: string, action: string): SimpleRule => ({
  type: 'simple',
  kind: 'RULE-SET',
  payload: providerName,
  action: actionFromToken(action),
  extraParams: [],
  rawText: `RULE-SET,${providerName},${action}`,
  priority: 0,
});
