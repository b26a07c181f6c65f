import punycode from 'punycode/';

import type { LogicRule, Rule, SimpleRule } from '../rules/model.js';

const DOMAIN_KINDS = new Set<string>(['DOMAIN', 'DOMAIN-SUFFIX']);

const toAsciiCondition = (rule: SimpleRule): SimpleRule => {
  if (!DOMAIN_KINDS.has(rule.kind)) return rule;
  const payload = punycode.toASCII(rule.payload);
  return payload === rule.payload ? rule : { ...rule, payload };
};

const toAsciiLogic = (rule: LogicRule): LogicRule => ({
  ...rule,
  conditions: rule.conditions.map((condition) =>
    condition.type === 'simple' ? toAsciiCondition(condition) : toAsciiLogic(condition),
  ),
});

/**
 * Encodes internationalized domain payloads (`DOMAIN`, `DOMAIN-SUFFIX`) as
 * punycode, which is what the proxy compares against.
 */
export const toAsciiDomainRule = (rule: Rule): Rule => {
  switch (rule.type) {
    case 'simple':
      return toAsciiCondition(rule);
    case 'logic':
      return toAsciiLogic(rule);
    case 'match':
      return rule;
  }
};
