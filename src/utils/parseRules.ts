import { parseStructuredInput } from '../rules/parseStructured.js';
import type { Diagnostic, ParseError } from '../rules/errors.js';
import type { Rule } from '../rules/model.js';

export interface RuleFailure {
  /** Position of the entry in the input. */
  index: number;
  error: ParseError;
}

export interface RuleDiagnostic {
  index: number;
  diagnostic: Diagnostic;
}

export interface ParsedRules {
  rules: Rule[];
  failures: RuleFailure[];
  diagnostics: RuleDiagnostic[];
}

/**
 * Parses every entry on its own; one bad entry never stops the rest.
 * Blank lines are skipped without a failure. Accepted rules are numbered by
 * their position in the result.
 */
export const parseRules = (entries: readonly unknown[]): ParsedRules => {
  const rules: Rule[] = [];
  const failures: RuleFailure[] = [];
  const diagnostics: RuleDiagnostic[] = [];

  entries.forEach((entry, index) => {
    const result = parseStructuredInput(entry);
    diagnostics.push(...result.diagnostics.map((diagnostic) => ({ index, diagnostic })));

    if (result.ok) {
      rules.push({ ...result.rule, priority: rules.length });
    } else if (result.error.kind !== 'Empty') {
      failures.push({ index, error: result.error });
    }
  });

  return { rules, failures, diagnostics };
};
