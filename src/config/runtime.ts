import { envFlag } from '../util/env.js';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: LogLevel;
};

const LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(v: string): v is LogLevel {
    return (LEVELS as readonly string[]).includes(v);
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env, testEnv = false): Runtime {
    const production = envFlag("LOAN_PRODUCTION", env);
    const verbose = envFlag("LOAN_VERBOSE", env) && !production;

    const explicit = (env.LOG_LEVEL ?? "").trim().toLowerCase();
    let logLevel: LogLevel = verbose ? 'debug' : 'info';
    if (isLogLevel(explicit)) logLevel = explicit;
    else if (testEnv) logLevel = 'silent';

    return {
        production,
        verbose,
        logLevel,
    };
}
