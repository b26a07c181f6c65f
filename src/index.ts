export * from './rules/index.js';
export { parseRules, type ParsedRules, type RuleDiagnostic, type RuleFailure } from './utils/parseRules.js';
export { removeDuplicateRules } from './utils/removeDuplicateRules.js';
export { buildRuleSetRule } from './utils/buildRuleSetRule.js';
export { buildRuleProviders, type RuleProviders } from './utils/buildRuleProviders.js';
export { toAsciiDomainRule } from './utils/toAsciiDomainRule.js';
export { loadRuleFiles, type LoadedRuleFiles } from './utils/loadRuleFiles.js';
export { parseEnv, type Env } from './config.js';
export { createServer } from './createServer.js';
export type { CreateServerProps, JsonValue, LoadProblem } from './types.js';
