import { conditionString, type Rule, type SimpleRule } from '../rules/model.js';
import { renderAction } from '../rules/serialize.js';
import { buildRuleSetRule } from './buildRuleSetRule.js';

export interface RuleProviders {
  /** Provider name → condition lines, in rule order. */
  providers: Map<string, string[]>;
  /** One `RULE-SET` rule per provider, in first-seen order. */
  rules: SimpleRule[];
}

/**
 * Groups rules by action into rule-set providers named `prefix + action`.
 * A proxy then needs a single `RULE-SET,<provider>,<action>` line per group.
 */
export const buildRuleProviders = (rules: readonly Rule[], prefix: string): RuleProviders => {
  const providers = new Map<string, string[]>();
  const ruleSetRules: SimpleRule[] = [];

  for (const rule of rules) {
    if (rule.type === 'match') continue;
    const action = renderAction(rule.action);
    const name = `${prefix}${action}`;

    let conditions = providers.get(name);
    if (!conditions) {
      conditions = [];
      providers.set(name, conditions);
      ruleSetRules.push(buildRuleSetRule(name, action));
    }
    conditions.push(conditionString(rule));
  }

  return { providers, rules: ruleSetRules };
};
