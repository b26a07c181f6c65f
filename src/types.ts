export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface LoadProblem {
  /** File the problem was found in. */
  file: string;
  /** Entry index within the file, after includes are expanded. */
  index?: number;
  message: string;
}

export interface CreateServerProps {
  /** Secret path segment protecting this service, e.g. `abc123` → `/abc123/rules` */
  secretUrl: string;
  /** Directory with `top.json`, `ruleset.json` and `includes/`. */
  rulesDir?: string;
  /** Prefix of the rule-set provider names, e.g. `Custom_` → `Custom_Proxy`. */
  rulesetPrefix?: string;
  /** Punycode-encode internationalized domain payloads in served rules. */
  asciiDomains?: boolean;
  /** Enable Fastify logger, or pass its options (e.g. `{ level: 'warn' }`). */
  logger?: boolean | { level: string };
}
