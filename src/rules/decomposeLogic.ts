import {
  CONDITION_ACTION,
  isSimpleKind,
  ruleKindFromToken,
  type SimpleRule,
} from './model.js';
import type { Diagnostic } from './errors.js';

export interface Decomposition {
  conditions: SimpleRule[];
  diagnostics: Diagnostic[];
}

type ConditionResult =
  | { ok: true; condition: SimpleRule }
  | { ok: false; diagnostic: Diagnostic };

/** Parses one `KIND,payload` group. The payload keeps any further commas. */
export const parseCondition = (text: string): ConditionResult => {
  const comma = text.indexOf(',');
  const token = (comma === -1 ? text : text.slice(0, comma)).trim();
  const payload = comma === -1 ? '' : text.slice(comma + 1).trim();
  if (!token || !payload) {
    return { ok: false, diagnostic: { kind: 'InvalidCondition', text } };
  }

  const kind = ruleKindFromToken(token);
  if (!kind) {
    return { ok: false, diagnostic: { kind: 'UnknownRuleKind', token, text } };
  }
  if (kind === 'MATCH') {
    return { ok: false, diagnostic: { kind: 'InvalidCondition', text } };
  }
  if (!isSimpleKind(kind)) {
    return { ok: false, diagnostic: { kind: 'NestedLogicUnsupported', text } };
  }

  return {
    ok: true,
    condition: {
      type: 'simple',
      kind,
      payload,
      action: CONDITION_ACTION,
      extraParams: [],
      rawText: text,
      priority: 0,
    },
  };
};

/**
 * Splits the body of a logic rule, e.g. `(DOMAIN,a.com),(NETWORK,UDP)`, into
 * its top-level parenthesized conditions.
 *
 * Characters outside any group are discarded. Groups that fail to parse are
 * dropped and reported, so a partially broken rule still yields the
 * conditions that did parse. Groups are never parsed as logic rules
 * themselves: a nested `AND`/`OR`/`NOT` group is dropped.
 */
export const decomposeLogic = (body: string): Decomposition => {
  const conditions: SimpleRule[] = [];
  const diagnostics: Diagnostic[] = [];
  let depth = 0;
  let buffer = '';

  for (let offset = 0; offset < body.length; offset++) {
    const char = body[offset];

    if (char === '(') {
      if (depth > 0) buffer += char;
      depth++;
      continue;
    }

    if (char === ')') {
      if (depth === 0) {
        diagnostics.push({ kind: 'UnmatchedParenthesis', offset, text: body });
        continue;
      }
      depth--;
      if (depth > 0) {
        buffer += char;
        continue;
      }
      const result = parseCondition(buffer);
      if (result.ok) conditions.push(result.condition);
      else diagnostics.push(result.diagnostic);
      buffer = '';
      continue;
    }

    if (depth > 0) buffer += char;
  }

  if (depth > 0) {
    diagnostics.push({ kind: 'UnclosedParenthesis', text: body });
  }

  return { conditions, diagnostics };
};
