/**
 * Every rule kind the parser accepts. This table is the only place a kind
 * token is defined; parsing, serialization and type narrowing all derive
 * from it.
 */
export const RULE_KINDS = [
  'DOMAIN',
  'DOMAIN-SUFFIX',
  'DOMAIN-KEYWORD',
  'DOMAIN-REGEX',
  'GEOSITE',

  'IP-CIDR',
  'IP-CIDR6',
  'IP-SUFFIX',
  'IP-ASN',
  'GEOIP',

  'SRC-GEOIP',
  'SRC-IP-ASN',
  'SRC-IP-CIDR',
  'SRC-IP-SUFFIX',

  'DST-PORT',
  'SRC-PORT',

  'IN-PORT',
  'IN-TYPE',
  'IN-USER',
  'IN-NAME',

  'PROCESS-PATH',
  'PROCESS-PATH-REGEX',
  'PROCESS-NAME',
  'PROCESS-NAME-REGEX',

  'UID',
  'NETWORK',
  'DSCP',

  'RULE-SET',
  'AND',
  'OR',
  'NOT',
  'SUB-RULE',

  'MATCH',
] as const;

export type RuleKind = (typeof RULE_KINDS)[number];

export const LOGIC_KINDS = ['AND', 'OR', 'NOT'] as const;

export type LogicKind = (typeof LOGIC_KINDS)[number];

export type SimpleKind = Exclude<RuleKind, LogicKind | 'MATCH'>;

export const BUILT_IN_ACTIONS = [
  'DIRECT',
  'REJECT',
  'REJECT-DROP',
  'PASS',
  'COMPATIBLE',
] as const;

export type BuiltInAction = (typeof BUILT_IN_ACTIONS)[number];

/** A built-in disposition, or the name of a user-defined proxy group. */
export type Action =
  | { readonly type: 'builtin'; readonly value: BuiltInAction }
  | { readonly type: 'named'; readonly name: string };

export interface SimpleRule {
  readonly type: 'simple';
  readonly kind: SimpleKind;
  readonly payload: string;
  readonly action: Action;
  /** Trailing qualifiers such as `no-resolve`. */
  readonly extraParams: readonly string[];
  readonly rawText: string;
  readonly priority: number;
}

export interface LogicRule {
  readonly type: 'logic';
  readonly kind: LogicKind;
  /**
   * Typed as a list of rules so combinators can nest, but the parser only
   * ever fills it with simple rules.
   */
  readonly conditions: readonly (SimpleRule | LogicRule)[];
  readonly action: Action;
  readonly rawText: string;
  readonly priority: number;
}

export interface MatchRule {
  readonly type: 'match';
  readonly kind: 'MATCH';
  readonly action: Action;
  readonly rawText: string;
  readonly priority: number;
}

export type Rule = SimpleRule | LogicRule | MatchRule;

/** Action carried by conditions inside a logic rule; they have none of their own. */
export const CONDITION_ACTION: Action = Object.freeze({ type: 'named', name: '' });

const RULE_KIND_SET: ReadonlySet<string> = new Set(RULE_KINDS);
const LOGIC_KIND_SET: ReadonlySet<string> = new Set(LOGIC_KINDS);
const BUILT_IN_ACTION_SET: ReadonlySet<string> = new Set(BUILT_IN_ACTIONS);

const isRuleKind = (token: string): token is RuleKind => RULE_KIND_SET.has(token);

export const isLogicKind = (kind: string): kind is LogicKind => LOGIC_KIND_SET.has(kind);

export const isSimpleKind = (kind: RuleKind): kind is SimpleKind =>
  kind !== 'MATCH' && !isLogicKind(kind);

const isBuiltInAction = (token: string): token is BuiltInAction =>
  BUILT_IN_ACTION_SET.has(token);

/** Case-insensitive lookup of a kind token. */
export const ruleKindFromToken = (token: string): RuleKind | undefined => {
  const upper = token.trim().toUpperCase();
  return isRuleKind(upper) ? upper : undefined;
};

export const actionFromToken = (token: string): Action => {
  const trimmed = token.trim();
  const upper = trimmed.toUpperCase();
  if (isBuiltInAction(upper)) return { type: 'builtin', value: upper };
  return { type: 'named', name: trimmed };
};

export const actionToken = (action: Action): string =>
  action.type === 'builtin' ? action.value : action.name;

export const conditionString = (rule: Rule): string => {
  switch (rule.type) {
    case 'simple':
      return `${rule.kind},${rule.payload}`;
    case 'logic':
      return `${rule.kind},(${rule.conditions
        .map((condition) => `(${conditionString(condition)})`)
        .join(',')})`;
    case 'match':
      return 'MATCH';
  }
};
