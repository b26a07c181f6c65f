import {
  actionFromToken,
  isLogicKind,
  isSimpleKind,
  ruleKindFromToken,
} from './model.js';
import { decomposeLogic } from './decomposeLogic.js';
import { failed, parsed, unwrapRule, type ParseResult } from './errors.js';
import type { Rule } from './model.js';

const LOGIC_PREFIXES = ['AND,', 'OR,', 'NOT,'];

const ACTION_SUFFIX = /^\s*,\s*([^,]+)$/;

const splitFields = (line: string) =>
  line
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

const parseMatchRule = (line: string): ParseResult => {
  const fields = splitFields(line);
  if (fields.length !== 2) return failed({ kind: 'InvalidMatchFormat', text: line });

  return parsed({
    type: 'match',
    kind: 'MATCH',
    action: actionFromToken(fields[1]),
    rawText: line,
    priority: 0,
  });
};

const parseSimpleRule = (line: string): ParseResult => {
  const fields = splitFields(line);
  if (fields.length < 3) return failed({ kind: 'InvalidRuleFormat', text: line });

  const [token, payload, action, ...extraParams] = fields;
  const kind = ruleKindFromToken(token);
  if (!kind) return failed({ kind: 'UnknownRuleKind', token, text: line });
  if (kind === 'MATCH') return failed({ kind: 'InvalidMatchFormat', text: line });
  // Logic keywords are case-sensitive, so `and,(...)` lands here.
  if (!isSimpleKind(kind)) return failed({ kind: 'InvalidLogicFormat', text: line });

  return parsed({
    type: 'simple',
    kind,
    payload,
    action: actionFromToken(action),
    extraParams,
    rawText: line,
    priority: 0,
  });
};

/** Index of the `)` closing the `(` at `open`, or -1. */
const findClosingParenthesis = (text: string, open: number): number => {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '(') depth++;
    else if (text[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

const parseLogicRule = (line: string): ParseResult => {
  const invalid = failed({ kind: 'InvalidLogicFormat', text: line });

  const comma = line.indexOf(',');
  const kind = line.slice(0, comma);
  if (!isLogicKind(kind)) return invalid;

  let open = comma + 1;
  while (open < line.length && /\s/.test(line[open])) open++;
  if (line[open] !== '(') return invalid;

  const close = findClosingParenthesis(line, open);
  if (close === -1) return invalid;

  const suffix = ACTION_SUFFIX.exec(line.slice(close + 1));
  const action = suffix?.[1].trim();
  if (!action) return invalid;

  const { conditions, diagnostics } = decomposeLogic(line.slice(open + 1, close));
  if (!conditions.length) return failed({ kind: 'EmptyConditions', text: line }, diagnostics);

  return parsed(
    {
      type: 'logic',
      kind,
      conditions,
      action: actionFromToken(action),
      rawText: line,
      priority: 0,
    },
    diagnostics,
  );
};

/**
 * Parses one rule line such as `DOMAIN-SUFFIX,google.com,Proxy`,
 * `MATCH,DIRECT` or `AND,((DOMAIN,ad.com),(NETWORK,UDP)),REJECT`.
 */
export const parseLine = (text: string): ParseResult => {
  const line = text.trim();
  if (!line) return failed({ kind: 'Empty' });

  if (LOGIC_PREFIXES.some((prefix) => line.startsWith(prefix))) {
    return parseLogicRule(line);
  }
  if (line.toUpperCase().startsWith('MATCH,')) {
    return parseMatchRule(line);
  }
  return parseSimpleRule(line);
};

export const parseLineOrThrow = (text: string): Rule => unwrapRule(parseLine(text));
