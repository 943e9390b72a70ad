import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, test, expect, jest, afterEach } from '@jest/globals';

const KEYS = ['LOG_LEVEL', 'LOAN_MAXIMUM_AMOUNT', 'DOTENV_CONFIG_PATH'] as const;

describe('decide entry point', () => {
  const savedEnv = KEYS.map((k) => [k, process.env[k]] as const);
  const savedArgv = process.argv;
  const savedExitCode = process.exitCode;
  let dir = '';

  afterEach(() => {
    for (const [k, v] of savedEnv) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
    process.argv = savedArgv;
    process.exitCode = savedExitCode;
    jest.restoreAllMocks();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  test('.env is applied before the logger and config read the environment', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'decide-env-'));
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(envFile, 'LOG_LEVEL=debug\nLOAN_MAXIMUM_AMOUNT=5000\n');
    delete process.env.LOG_LEVEL;
    delete process.env.LOAN_MAXIMUM_AMOUNT;
    process.env.DOTENV_CONFIG_PATH = envFile;
    process.argv = ['node', 'decide', '--code', '39001018009', '--amount', '4000', '--period', '12', '--json'];

    const lines: string[] = [];
    jest.spyOn(console, 'log').mockImplementation((line: unknown) => { lines.push(String(line)); });

    let level = '';
    jest.isolateModules(() => {
      jest.requireActual('../src/cli/main');
      level = jest.requireActual<typeof import('../src/utils/logger.js')>('../src/utils/logger').log.level();
    });

    expect(level).toBe('debug');
    expect(lines).toEqual(['{"loanAmount":5000,"loanPeriod":12,"errorMessage":null}']);
    expect(process.exitCode).toBe(0);
  });
});
