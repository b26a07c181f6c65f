import { describe, test, expect } from 'vitest';

import { parseStructured, parseStructuredInput } from '../parseStructured.js';
import { parseLine } from '../parseLine.js';

describe('parseStructured', () => {
  test('matches the textual form for simple rules', () => {
    expect(parseStructured({ type: 'DOMAIN', payload: 'x.com', action: 'DIRECT' })).toEqual(
      parseLine('DOMAIN,x.com,DIRECT'),
    );
  });

  test('appends extra params and upper-cases the type', () => {
    expect(
      parseStructured({
        type: 'domain-suffix',
        payload: 'a.com',
        action: 'Proxy',
        extra_params: ['no-resolve'],
      }),
    ).toEqual(parseLine('DOMAIN-SUFFIX,a.com,Proxy,no-resolve'));
  });

  test('accepts numeric payloads', () => {
    const result = parseStructured({ type: 'DST-PORT', payload: 443, action: 'DIRECT' });
    expect(result).toMatchObject({ ok: true, rule: { kind: 'DST-PORT', payload: '443' } });
  });

  test('builds logic rules from object and string conditions', () => {
    const expected = parseLine('AND,((DOMAIN,ad.com),(NETWORK,UDP)),REJECT');
    expect(
      parseStructured({
        type: 'AND',
        action: 'REJECT',
        conditions: [{ type: 'DOMAIN', payload: 'ad.com' }, '(NETWORK,UDP)'],
      }),
    ).toEqual(expected);
    expect(
      parseStructured({
        type: 'AND',
        action: 'REJECT',
        conditions: [{ type: 'DOMAIN', payload: 'ad.com' }, 'NETWORK,UDP'],
      }),
    ).toEqual(expected);
  });

  test('builds MATCH rules', () => {
    expect(parseStructured({ type: 'match', action: 'Proxy' })).toEqual(parseLine('MATCH,Proxy'));
  });

  test('passes strings to the line parser', () => {
    expect(parseStructured('MATCH,DIRECT')).toEqual(parseLine('MATCH,DIRECT'));
  });

  test('requires a type', () => {
    expect(parseStructured({ payload: 'x.com', action: 'DIRECT' })).toEqual({
      ok: false,
      error: { kind: 'MissingField', field: 'type', text: '{"payload":"x.com","action":"DIRECT"}' },
      diagnostics: [],
    });
  });

  test('requires a payload for simple kinds', () => {
    expect(parseStructured({ type: 'DOMAIN', action: 'DIRECT' })).toMatchObject({
      ok: false,
      error: { kind: 'MissingField', field: 'payload' },
    });
  });

  test('requires an action', () => {
    expect(parseStructured({ type: 'DOMAIN', payload: 'x.com' })).toMatchObject({
      ok: false,
      error: { kind: 'MissingField', field: 'action' },
    });
    expect(parseStructured({ type: 'MATCH' })).toMatchObject({
      ok: false,
      error: { kind: 'MissingField', field: 'action' },
    });
  });

  test.each([
    [{ type: 'OR', action: 'DIRECT' }],
    [{ type: 'OR', action: 'DIRECT', conditions: [] }],
    [{ type: 'OR', action: 'DIRECT', conditions: [{ type: 'DOMAIN' }, ''] }],
    [{ type: 'OR', action: 'DIRECT', conditions: [{ type: 'BAD', payload: 'x' }] }],
  ])('fails with EmptyConditions for %j', (input) => {
    expect(parseStructured(input)).toMatchObject({ ok: false, error: { kind: 'EmptyConditions' } });
  });
});

describe('parseStructured field checks', () => {
  test('rejects a comma inside the payload', () => {
    expect(parseStructured({ type: 'DOMAIN', payload: 'a,b', action: 'DIRECT' })).toEqual({
      ok: false,
      error: {
        kind: 'InvalidStructure',
        issues: ['payload: must not contain a comma'],
        text: '{"type":"DOMAIN","payload":"a,b","action":"DIRECT"}',
      },
      diagnostics: [],
    });
  });

  test('rejects a comma inside the action', () => {
    const result = parseStructured({ type: 'MATCH', action: 'Proxy,DIRECT' });
    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'InvalidStructure', issues: ['action: must not contain a comma'] },
    });
  });
});

describe('parseStructuredInput', () => {
  test('parses well-formed values', () => {
    expect(parseStructuredInput({ type: 'GEOIP', payload: 'CN', action: 'DIRECT' })).toEqual(
      parseLine('GEOIP,CN,DIRECT'),
    );
  });

  test('rejects values of the wrong shape', () => {
    const result = parseStructuredInput({ type: 5 });
    expect(result).toMatchObject({ ok: false, error: { kind: 'InvalidStructure', text: '{"type":5}' } });
    if (!result.ok && result.error.kind === 'InvalidStructure') {
      expect(result.error.issues).toEqual(['type: Expected string, received number']);
    }
  });

  test('rejects non-objects', () => {
    expect(parseStructuredInput(42)).toMatchObject({
      ok: false,
      error: { kind: 'InvalidStructure', issues: ['(root): Expected object, received number'] },
    });
  });
});
