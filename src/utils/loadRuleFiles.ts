import { readFileSync, existsSync } from 'fs';
import { join } from 'path';

import { formatDiagnostic, formatParseError } from '../rules/errors.js';
import { renderRule } from '../rules/serialize.js';
import { parseRules } from './parseRules.js';

import type { Rule } from '../rules/model.js';
import type { JsonValue, LoadProblem } from '../types.js';

export interface LoadedRuleFiles {
  /** Rules served as they are. */
  top: Rule[];
  /** Rules grouped into rule-set providers by action. */
  ruleset: Rule[];
  problems: LoadProblem[];
}

export const TOP_RULES_FILE = 'top.json';
export const RULESET_RULES_FILE = 'ruleset.json';

const INCLUDE_PATTERN = /"@include\s+([A-Za-z0-9._-]+)"/g;

const flattenRuleArray = (arr: JsonValue[]): JsonValue[] => {
  const out: JsonValue[] = [];
  for (const item of arr) {
    if (Array.isArray(item)) {
      // An include expands to an array inside the including array
      out.push(...flattenRuleArray(item));
    } else {
      out.push(item);
    }
  }
  return out;
};

/**
 * Reads the rule files in `rulesDir`: `top.json` and `ruleset.json`, each a
 * JSON array of rule lines or structured rules. An `"@include name"` entry
 * is replaced by the array in `includes/name.json`.
 */
export const loadRuleFiles = (rulesDir: string): LoadedRuleFiles => {
  const problems: LoadProblem[] = [];
  const includesDir = join(rulesDir, 'includes');

  const expandIncludes = (text: string, seen = new Set<string>()): string =>
    text.replace(INCLUDE_PATTERN, (_m, name: string) => {
      const fileName = name.endsWith('.json') ? name : `${name}.json`;
      const fullPath = join(includesDir, fileName);
      if (seen.has(fullPath) || !existsSync(fullPath)) return '[]';
      try {
        seen.add(fullPath);
        const content = expandIncludes(readFileSync(fullPath, 'utf8'), seen);
        seen.delete(fullPath);
        return content.trim();
      } catch (err) {
        problems.push({ file: fullPath, message: `Include failed: ${err}` });
        return '[]';
      }
    });

  const loadFile = (fileName: string): Rule[] => {
    const fullPath = join(rulesDir, fileName);
    if (!existsSync(fullPath)) return [];

    let entries: JsonValue;
    try {
      entries = JSON.parse(expandIncludes(readFileSync(fullPath, 'utf8')));
    } catch (err) {
      problems.push({ file: fullPath, message: `Failed to load: ${err}` });
      return [];
    }
    if (!Array.isArray(entries)) {
      problems.push({ file: fullPath, message: 'Expected a JSON array of rules' });
      return [];
    }

    const { rules, failures, diagnostics } = parseRules(flattenRuleArray(entries));
    for (const { index, error } of failures) {
      problems.push({ file: fullPath, index, message: formatParseError(error) });
    }
    for (const { index, diagnostic } of diagnostics) {
      problems.push({ file: fullPath, index, message: formatDiagnostic(diagnostic) });
    }
    return rules;
  };

  // Providers hold conditions only, so a MATCH here has nowhere to go.
  const loadRuleset = (): Rule[] =>
    loadFile(RULESET_RULES_FILE).filter((rule) => {
      if (rule.type !== 'match') return true;
      problems.push({
        file: join(rulesDir, RULESET_RULES_FILE),
        message: `MATCH belongs in ${TOP_RULES_FILE}, ignored: ${renderRule(rule)}`,
      });
      return false;
    });

  return {
    top: loadFile(TOP_RULES_FILE),
    ruleset: loadRuleset(),
    problems,
  };
};
