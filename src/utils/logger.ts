import pino from 'pino';
import { resolveRuntime } from '../config/runtime.js';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

const runtime = resolveRuntime(process.env, isTestEnv());

// stdout belongs to the CLI output; logs go to stderr.
const logger = pino({
  level: runtime.logLevel,
  base: undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.epochTime,
}, pino.destination({ dest: 2, sync: true }));

function error(msg: string, scope?: string, data?: Data) {
  logger.error({ scope, ...data }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
  logger.debug({ scope, ...data }, msg);
}

function level(): string {
  return logger.level;
}

export type ScopedLogger = {
  debug: (msg: string, data?: Data) => void;
};

function withScope(scope: string): ScopedLogger {
  return {
    debug: (msg, data) => debug(msg, scope, data),
  };
}

export const log = { error, debug, level, withScope };
