import { getDecisionConfig, type DecisionConfig } from '../config/index.js';
import { DecisionEngine } from '../loans/engine.js';
import { toDecisionResponse } from '../loans/response.js';
import { formatUserError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { getPalette } from './theme.js';

export const EXIT = {
  APPROVED: 0,
  FAILURE: 1,
  REJECTED: 2,
  USAGE: 64,
} as const;

export type DecideArgs = {
  code: string;
  amount: number;
  period: number;
  json: boolean;
  noColor: boolean;
  verbose: boolean;
};

export type DecideIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  config?: () => Readonly<DecisionConfig>;
  now?: () => Date;
};

export const USAGE = 'usage: decide --code <personal code> --amount <amount> --period <months> [--json] [--no-color] [--verbose]';

export type ParseResult = { ok: true; args: DecideArgs } | { ok: false; error: string };

function readInt(name: string, raw: string | undefined): number | string {
  if (raw === undefined || raw === '') return `missing --${name}`;
  if (!/^\d+$/.test(raw)) return `--${name} must be a whole number, got "${raw}"`;
  return Number(raw);
}

export function parseDecideArgs(argv: string[]): ParseResult {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) return { ok: false, error: `unexpected argument "${a}"` };
    const eq = a.indexOf('=');
    if (eq > 0) {
      values.set(a.slice(2, eq), a.slice(eq + 1));
    } else if (a === '--json' || a === '--no-color' || a === '--verbose') {
      flags.add(a.slice(2));
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) return { ok: false, error: `missing value for ${a}` };
      values.set(a.slice(2), next);
      i++;
    }
  }

  const code = values.get('code');
  if (!code) return { ok: false, error: 'missing --code' };
  const amount = readInt('amount', values.get('amount'));
  if (typeof amount === 'string') return { ok: false, error: amount };
  const period = readInt('period', values.get('period'));
  if (typeof period === 'string') return { ok: false, error: period };

  return {
    ok: true,
    args: {
      code,
      amount,
      period,
      json: flags.has('json'),
      noColor: flags.has('no-color'),
      verbose: flags.has('verbose'),
    },
  };
}

export function runDecide(argv: string[], io: DecideIO): number {
  const parsed = parseDecideArgs(argv);
  if (!parsed.ok) {
    io.err(parsed.error);
    io.err(USAGE);
    return EXIT.USAGE;
  }
  const { args } = parsed;
  const p = getPalette({ noColor: args.noColor || args.json });

  try {
    const config = (io.config ?? getDecisionConfig)();
    const engine = new DecisionEngine(config, { now: io.now });
    const decision = engine.decide({ personalCode: args.code, amount: args.amount, period: args.period });

    if (args.json) {
      io.out(JSON.stringify(toDecisionResponse(decision)));
    } else if (decision.approved) {
      io.out(`${p.success('approved')} ${p.bold(String(decision.loanAmount))} over ${p.bold(String(decision.loanPeriod))} months`);
    } else {
      io.out(`${p.error('rejected')} ${decision.errorMessage} ${p.dim(`(${decision.code})`)}`);
    }
    return decision.approved ? EXIT.APPROVED : EXIT.REJECTED;
  } catch (err) {
    log.error('decide failed', 'cli', { error: formatUserError(err, false) });
    io.err(p.error(formatUserError(err, args.verbose)));
    return EXIT.FAILURE;
  }
}
