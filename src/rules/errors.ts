import type { Rule } from './model.js';

export type ParseError =
  /** Blank input. Callers skip it rather than report it. */
  | { readonly kind: 'Empty' }
  | { readonly kind: 'UnknownRuleKind'; readonly token: string; readonly text: string }
  | { readonly kind: 'InvalidRuleFormat'; readonly text: string }
  | { readonly kind: 'InvalidMatchFormat'; readonly text: string }
  | { readonly kind: 'InvalidLogicFormat'; readonly text: string }
  | { readonly kind: 'MissingField'; readonly field: string; readonly text: string }
  | { readonly kind: 'EmptyConditions'; readonly text: string }
  | { readonly kind: 'InvalidStructure'; readonly issues: readonly string[]; readonly text: string };

/** Something the logic decomposer skipped while still producing a rule. */
export type Diagnostic =
  | { readonly kind: 'InvalidCondition'; readonly text: string }
  | { readonly kind: 'UnknownRuleKind'; readonly token: string; readonly text: string }
  | { readonly kind: 'NestedLogicUnsupported'; readonly text: string }
  | { readonly kind: 'UnmatchedParenthesis'; readonly offset: number; readonly text: string }
  | { readonly kind: 'UnclosedParenthesis'; readonly text: string };

export type ParseResult =
  | { readonly ok: true; readonly rule: Rule; readonly diagnostics: readonly Diagnostic[] }
  | { readonly ok: false; readonly error: ParseError; readonly diagnostics: readonly Diagnostic[] };

export const parsed = (rule: Rule, diagnostics: readonly Diagnostic[] = []): ParseResult => ({
  ok: true,
  rule,
  diagnostics,
});

export const failed = (error: ParseError, diagnostics: readonly Diagnostic[] = []): ParseResult => ({
  ok: false,
  error,
  diagnostics,
});

export const formatParseError = (error: ParseError): string => {
  switch (error.kind) {
    case 'Empty':
      return 'Empty rule';
    case 'UnknownRuleKind':
      return `Unknown rule type '${error.token}' in rule: ${error.text}`;
    case 'InvalidRuleFormat':
      return `Invalid rule format (needs at least 3 parts): ${error.text}`;
    case 'InvalidMatchFormat':
      return `Invalid MATCH rule format: ${error.text}`;
    case 'InvalidLogicFormat':
      return `Invalid logic rule format: ${error.text}`;
    case 'MissingField':
      return `Missing '${error.field}' in rule: ${error.text}`;
    case 'EmptyConditions':
      return `No valid conditions found in rule: ${error.text}`;
    case 'InvalidStructure':
      return `Invalid rule structure (${error.issues.join('; ')}): ${error.text}`;
  }
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  switch (diagnostic.kind) {
    case 'InvalidCondition':
      return `Skipping invalid condition '${diagnostic.text}'`;
    case 'UnknownRuleKind':
      return `Skipping condition with unknown rule type '${diagnostic.token}': ${diagnostic.text}`;
    case 'NestedLogicUnsupported':
      return `Skipping nested logic condition '${diagnostic.text}'`;
    case 'UnmatchedParenthesis':
      return `Unmatched closing parenthesis at ${diagnostic.offset} in conditions: ${diagnostic.text}`;
    case 'UnclosedParenthesis':
      return `Unclosed parenthesis in conditions: ${diagnostic.text}`;
  }
};

/** Thrown by the fail-fast entry points. */
export class RuleParseError extends Error {
  readonly detail: ParseError;

  constructor(detail: ParseError) {
    super(formatParseError(detail));
    this.name = 'RuleParseError';
    this.detail = detail;
  }
}

export const unwrapRule = (result: ParseResult): Rule => {
  if (!result.ok) throw new RuleParseError(result.error);
  return result.rule;
};
