import { describe, test, expect } from 'vitest';

import { parseLineOrThrow } from '../parseLine.js';
import { parseStructured } from '../parseStructured.js';
import { renderRule, toStructured } from '../serialize.js';
import { CONDITION_ACTION, conditionString, type LogicRule } from '../model.js';

const CANONICAL_LINES = [
  'DOMAIN-SUFFIX,google.com,Proxy',
  'IP-CIDR,10.0.0.0/8,DIRECT,no-resolve',
  'PROCESS-NAME,curl,REJECT-DROP',
  'MATCH,DIRECT',
  'AND,((DOMAIN,ad.com),(NETWORK,UDP)),REJECT',
  'NOT,((DOMAIN-KEYWORD,ads)),REJECT',
  'OR,((DST-PORT,443),(IP-CIDR,1.1.1.1/32,no-resolve)),Proxy',
];

describe('renderRule', () => {
  test.each(CANONICAL_LINES)('renders %s back unchanged', (line) => {
    expect(renderRule(parseLineOrThrow(line))).toBe(line);
  });

  test('normalizes whitespace', () => {
    expect(renderRule(parseLineOrThrow('  DOMAIN , a.com ,  Proxy '))).toBe('DOMAIN,a.com,Proxy');
    expect(renderRule(parseLineOrThrow('OR, ( (DOMAIN,a.com) , (NETWORK, TCP) ),  Proxy'))).toBe(
      'OR,((DOMAIN,a.com),(NETWORK,TCP)),Proxy',
    );
  });

  test('renders built-in actions in upper case', () => {
    expect(renderRule(parseLineOrThrow('domain,a.com,direct'))).toBe('DOMAIN,a.com,DIRECT');
  });

  test.each(CANONICAL_LINES)('reparsing %s gives an equal rule', (line) => {
    const rule = parseLineOrThrow(line);
    expect(parseLineOrThrow(renderRule(rule))).toEqual(rule);
  });
});

describe('conditionString', () => {
  test('omits the action', () => {
    expect(conditionString(parseLineOrThrow('DOMAIN-SUFFIX,google.com,Proxy'))).toBe(
      'DOMAIN-SUFFIX,google.com',
    );
    expect(conditionString(parseLineOrThrow('MATCH,Proxy'))).toBe('MATCH');
    expect(conditionString(parseLineOrThrow('AND,((DOMAIN,ad.com),(NETWORK,UDP)),REJECT'))).toBe(
      'AND,((DOMAIN,ad.com),(NETWORK,UDP))',
    );
  });

  test('renders nested logic rules built in code', () => {
    const inner: LogicRule = {
      type: 'logic',
      kind: 'OR',
      conditions: [
        {
          type: 'simple',
          kind: 'DOMAIN',
          payload: 'a.com',
          action: CONDITION_ACTION,
          extraParams: [],
          rawText: 'DOMAIN,a.com',
          priority: 0,
        },
      ],
      action: CONDITION_ACTION,
      rawText: '',
      priority: 0,
    };
    const outer: LogicRule = {
      ...inner,
      kind: 'AND',
      conditions: [inner],
      action: { type: 'builtin', value: 'DIRECT' },
    };
    expect(conditionString(outer)).toBe('AND,((OR,((DOMAIN,a.com))))');
  });
});

describe('toStructured', () => {
  test('produces the key/value form', () => {
    expect(toStructured(parseLineOrThrow('IP-CIDR,10.0.0.0/8,DIRECT,no-resolve'))).toEqual({
      type: 'IP-CIDR',
      payload: '10.0.0.0/8',
      action: 'DIRECT',
      extra_params: ['no-resolve'],
    });
    expect(toStructured(parseLineOrThrow('DOMAIN,a.com,Proxy'))).toEqual({
      type: 'DOMAIN',
      payload: 'a.com',
      action: 'Proxy',
    });
    expect(toStructured(parseLineOrThrow('AND,((DOMAIN,ad.com),(NETWORK,UDP)),REJECT'))).toEqual({
      type: 'AND',
      action: 'REJECT',
      conditions: [
        { type: 'DOMAIN', payload: 'ad.com' },
        { type: 'NETWORK', payload: 'UDP' },
      ],
    });
    expect(toStructured(parseLineOrThrow('MATCH,DIRECT'))).toEqual({ type: 'MATCH', action: 'DIRECT' });
  });

  test.each(CANONICAL_LINES)('parses the structured form of %s back to the same rule', (line) => {
    const rule = parseLineOrThrow(line);
    expect(parseStructured(toStructured(rule))).toEqual({ ok: true, rule, diagnostics: [] });
  });
});
