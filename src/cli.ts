#!/usr/bin/env node
import { parseEnv } from './config.js';
import { createServer } from './createServer.js';

const env = parseEnv();

const app = createServer({
  secretUrl: env.SECRET_URL,
  rulesDir: env.RULES_DIR,
  rulesetPrefix: env.RULESET_PREFIX,
  asciiDomains: env.ASCII_DOMAINS,
  logger: { level: env.LOG_LEVEL },
});

app.listen({ port: env.PORT, host: env.HOST }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});

const shutdown = () => {
  app.close().then(
    () => process.exit(0),
    (err) => {
      app.log.error(err);
      process.exit(1);
    },
  );
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
