export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function envFlag(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
    const v = (env[name] ?? "").trim().toLowerCase();
    return v === "true" || v === "1" || v === "yes";
}

/** Integer env var; undefined when unset or blank, throws when not an integer. */
export function envInt(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    const s = raw.trim().replace(/_/g, "");
    if (!/^-?\d+$/.test(s)) throw new Error(`${name} must be an integer, got "${raw}"`);
    return Number(s);
}
