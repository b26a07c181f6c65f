import Fastify from 'fastify';
import { z } from 'zod';

import { DEFAULT_RULES_DIR, DEFAULT_RULESET_PREFIX } from './constants.js';
import { formatDiagnostic, formatParseError } from './rules/errors.js';
import { renderRule, toStructured } from './rules/serialize.js';
import { buildRuleProviders } from './utils/buildRuleProviders.js';
import { loadRuleFiles } from './utils/loadRuleFiles.js';
import { parseRules } from './utils/parseRules.js';
import { removeDuplicateRules } from './utils/removeDuplicateRules.js';
import { toAsciiDomainRule } from './utils/toAsciiDomainRule.js';

import type { Rule } from './rules/model.js';
import type { CreateServerProps } from './types.js';

const parseBodySchema = z.object({ rules: z.array(z.unknown()) });

export function createServer({
  secretUrl,
  rulesDir = DEFAULT_RULES_DIR,
  rulesetPrefix = DEFAULT_RULESET_PREFIX,
  asciiDomains = true,
  logger = true,
}: CreateServerProps) {
  const app = Fastify({ logger });

  const { top, ruleset, problems } = loadRuleFiles(rulesDir);
  for (const problem of problems) {
    const at = problem.index === undefined ? '' : ` [${problem.index}]`;
    app.log.warn(`${problem.file}${at}: ${problem.message}`);
  }

  // Encode before deduplicating: `bücher.de` and `xn--bcher-kva.de` are one condition.
  const prepare = (rules: Rule[]) =>
    removeDuplicateRules(asciiDomains ? rules.map(toAsciiDomainRule) : rules);

  const topRules = prepare(top);
  const { providers, rules: ruleSetRules } = buildRuleProviders(prepare(ruleset), rulesetPrefix);

  /**
   * MATCH ends the list: anything after it would never be reached,
   * including the rule-set references.
   */
  const RULE_LINES = [
    ...topRules.filter((rule) => rule.type !== 'match'),
    ...ruleSetRules,
    ...topRules.filter((rule) => rule.type === 'match'),
  ].map(renderRule);

  app.log.info(`Loaded ${topRules.length} top rules and ${providers.size} rule-set providers`);

  app.get(`/${secretUrl}/rules`, async (_req, reply) => {
    reply.type('application/json').send(JSON.stringify({ rules: RULE_LINES }, null, 2));
  });

  app.get<{ Params: { name: string } }>(
    `/${secretUrl}/ruleset/:name`,
    async (req, reply) => {
      const conditions = providers.get(req.params.name);
      if (!conditions) return reply.code(404).send({ error: 'ruleset_not_found' });
      reply.type('text/plain; charset=utf-8').send(conditions.join('\n'));
    },
  );

  app.post(`/${secretUrl}/parse`, async (req, reply) => {
    const body = parseBodySchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ error: 'invalid_body' });

    const { rules, failures, diagnostics } = parseRules(body.data.rules);
    for (const { index, diagnostic } of diagnostics) {
      req.log.warn(`Rule ${index}: ${formatDiagnostic(diagnostic)}`);
    }

    reply.send({
      rules: rules.map(toStructured),
      lines: rules.map(renderRule),
      failures: failures.map(({ index, error }) => ({
        index,
        kind: error.kind,
        message: formatParseError(error),
      })),
      diagnostics: diagnostics.map(({ index, diagnostic }) => ({
        index,
        kind: diagnostic.kind,
        message: formatDiagnostic(diagnostic),
      })),
    });
  });

  app.setNotFoundHandler((_, reply) => reply.code(204).send());

  return app;
}
