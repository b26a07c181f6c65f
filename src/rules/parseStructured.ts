import { z } from 'zod';

import { isLogicKind } from './model.js';
import { failed, type ParseResult } from './errors.js';
import { parseLine } from './parseLine.js';

/** Key/value form of a rule, as found in JSON rule files. */
export interface StructuredRule {
  type?: string;
  action?: string;
  payload?: string | number;
  extra_params?: (string | number)[];
  /** Entries are `{ type, payload }` objects or `(KIND,payload)` strings. */
  conditions?: (StructuredRule | string)[];
}

export const structuredRuleSchema: z.ZodType<StructuredRule> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    action: z.string().optional(),
    payload: z.union([z.string(), z.number()]).optional(),
    extra_params: z.array(z.union([z.string(), z.number()])).optional(),
    conditions: z.array(z.union([z.string(), structuredRuleSchema])).optional(),
  }),
);

const stringifyInput = (value: unknown): string => JSON.stringify(value) ?? String(value);

const conditionText = (entry: StructuredRule | string): string => {
  if (typeof entry === 'string') {
    const text = entry.trim();
    if (!text || text.startsWith('(')) return text;
    return `(${text})`;
  }
  const type = entry.type?.trim();
  const payload = entry.payload === undefined ? '' : String(entry.payload).trim();
  return type && payload ? `(${type},${payload})` : '';
};

/**
 * Rebuilds the textual form of a structured rule and parses that, so both
 * input shapes share one parser.
 */
export const parseStructured = (input: StructuredRule | string): ParseResult => {
  if (typeof input === 'string') return parseLine(input);

  const text = stringifyInput(input);
  const type = input.type?.trim().toUpperCase();
  if (!type) return failed({ kind: 'MissingField', field: 'type', text });
  const action = input.action?.trim();
  const payload = input.payload === undefined ? '' : String(input.payload).trim();

  // A comma would shift the fields of the rebuilt line.
  const issues = Object.entries({ payload, action })
    .filter(([, value]) => value?.includes(','))
    .map(([field]) => `${field}: must not contain a comma`);
  if (issues.length) return failed({ kind: 'InvalidStructure', issues, text });

  if (isLogicKind(type)) {
    const body = (input.conditions ?? []).map(conditionText).filter(Boolean).join(',');
    if (!body) return failed({ kind: 'EmptyConditions', text });
    if (!action) return failed({ kind: 'MissingField', field: 'action', text });
    return parseLine(`${type},(${body}),${action}`);
  }

  if (type === 'MATCH') {
    if (!action) return failed({ kind: 'MissingField', field: 'action', text });
    return parseLine(`MATCH,${action}`);
  }

  if (!payload) return failed({ kind: 'MissingField', field: 'payload', text });
  if (!action) return failed({ kind: 'MissingField', field: 'action', text });

  const extraParams = (input.extra_params ?? []).map(String);
  return parseLine([type, payload, action, ...extraParams].join(','));
};

/** Like {@link parseStructured}, for values of unknown shape (parsed JSON, request bodies). */
export const parseStructuredInput = (value: unknown): ParseResult => {
  if (typeof value === 'string') return parseLine(value);

  const result = structuredRuleSchema.safeParse(value);
  if (!result.success) {
    return failed({
      kind: 'InvalidStructure',
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
      text: stringifyInput(value),
    });
  }
  return parseStructured(result.data);
};
