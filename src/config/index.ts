import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { envInt } from '../util/env.js';

export type DecisionConfig = {
  minimumLoanAmount: number;
  maximumLoanAmount: number;
  minimumLoanPeriod: number; // months
  maximumLoanPeriod: number; // months
  segment1CreditModifier: number;
  segment2CreditModifier: number;
  segment3CreditModifier: number;
  minimumAge: number; // years
};

export const DEFAULT_DECISION_CONFIG: Readonly<DecisionConfig> = Object.freeze({
  minimumLoanAmount: 2000,
  maximumLoanAmount: 10000,
  minimumLoanPeriod: 12,
  maximumLoanPeriod: 60,
  segment1CreditModifier: 100,
  segment2CreditModifier: 300,
  segment3CreditModifier: 1000,
  minimumAge: 18,
});

const positiveInt = z.number().int().positive();

export const decisionConfigSchema = z.object({
  minimumLoanAmount: positiveInt,
  maximumLoanAmount: positiveInt,
  minimumLoanPeriod: positiveInt,
  maximumLoanPeriod: positiveInt,
  segment1CreditModifier: positiveInt,
  segment2CreditModifier: positiveInt,
  segment3CreditModifier: positiveInt,
  minimumAge: z.number().int().min(0),
}).strict().superRefine((c, ctx) => {
  if (c.minimumLoanAmount > c.maximumLoanAmount) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maximumLoanAmount'], message: 'must be >= minimumLoanAmount' });
  }
  if (c.minimumLoanPeriod > c.maximumLoanPeriod) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maximumLoanPeriod'], message: 'must be >= minimumLoanPeriod' });
  }
});

// File sections may be partial; missing keys fall back to defaults.
const fileSchema = z.object({
  minimumLoanAmount: z.number(),
  maximumLoanAmount: z.number(),
  minimumLoanPeriod: z.number(),
  maximumLoanPeriod: z.number(),
  segment1CreditModifier: z.number(),
  segment2CreditModifier: z.number(),
  segment3CreditModifier: z.number(),
  minimumAge: z.number(),
}).partial().strict();

const ENV_KEYS: ReadonlyArray<[keyof DecisionConfig, string]> = [
  ['minimumLoanAmount', 'LOAN_MINIMUM_AMOUNT'],
  ['maximumLoanAmount', 'LOAN_MAXIMUM_AMOUNT'],
  ['minimumLoanPeriod', 'LOAN_MINIMUM_PERIOD'],
  ['maximumLoanPeriod', 'LOAN_MAXIMUM_PERIOD'],
  ['segment1CreditModifier', 'LOAN_SEGMENT_1_MODIFIER'],
  ['segment2CreditModifier', 'LOAN_SEGMENT_2_MODIFIER'],
  ['segment3CreditModifier', 'LOAN_SEGMENT_3_MODIFIER'],
  ['minimumAge', 'LOAN_MINIMUM_AGE'],
];

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[], source?: string) {
    super(`Invalid decision config${source ? ` (${source})` : ''}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

export function defaultConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(process.cwd(), env.LOAN_CONFIG_FILE || path.join('config', 'decision.json'));
}

function readConfigFile(file: string): Partial<DecisionConfig> {
  if (!fs.existsSync(file)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError([`could not parse JSON: ${e instanceof Error ? e.message : String(e)}`], file);
  }
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error), file);
  return parsed.data;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<DecisionConfig> {
  const out: Partial<DecisionConfig> = {};
  const issues: string[] = [];
  for (const [key, name] of ENV_KEYS) {
    try {
      const v = envInt(name, env);
      if (v !== undefined) out[key] = v;
    } catch (e) {
      issues.push(e instanceof Error ? e.message : String(e));
    }
  }
  if (issues.length) throw new ConfigError(issues, 'environment');
  return out;
}

/**
 * Resolve the decision policy: defaults, then the JSON file, then LOAN_* env vars.
 * The result is validated and frozen.
 */
export function loadDecisionConfig(opts: { file?: string; env?: NodeJS.ProcessEnv } = {}): Readonly<DecisionConfig> {
  const env = opts.env ?? process.env;
  const file = opts.file ?? defaultConfigFile(env);
  const merged = { ...DEFAULT_DECISION_CONFIG, ...readConfigFile(file), ...readEnvOverrides(env) };
  const result = decisionConfigSchema.safeParse(merged);
  if (!result.success) throw new ConfigError(formatIssues(result.error), file);
  return Object.freeze(result.data);
}

let cfg: Readonly<DecisionConfig> | null = null;

export function getDecisionConfig(): Readonly<DecisionConfig> {
  if (!cfg) cfg = loadDecisionConfig();
  return cfg;
}

// For testing: reset the cache
export function resetDecisionConfigCache() {
  cfg = null;
}
