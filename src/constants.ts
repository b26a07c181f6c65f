export const DEFAULT_RULES_DIR = 'rules';

export const DEFAULT_RULESET_PREFIX = 'Custom_';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
