import { runCli, CliIO, ExitCodes } from '../../src/cli';
import { configureLogger, logger } from '../../src/utils/logger';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';

const SAMPLE = 'data-lake/raw/AB12/sample.csv';
const SAMPLE_DIGEST = '492d5ea496056f1a6a6592241032fab764c321596317930b4fa0e1e8bc3b7470';

describe('runCli', () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIO;

  const run = (...args: string[]) => runCli(['--quiet', '--root', root, ...args], io);

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'sidecar-cli-'));
    stdout = [];
    stderr = [];
    io = {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      env: {},
    };
    await fs.outputFile(path.join(root, SAMPLE), 'a,b\n1,2\n');
  });

  afterEach(async () => {
    configureLogger({ level: 'info', quiet: true });
    await fs.remove(root);
  });

  it('should write sidecars for the passed files and exit 0', async () => {
    const code = await run('update', SAMPLE);

    expect(code).toBe(ExitCodes.OK);
    expect(stdout).toEqual(['Wrote 1 sidecar(s), 8.0 B hashed\n']);
    expect(await fs.readFile(path.join(root, `${SAMPLE}.sha256`), 'utf8')).toBe(`${SAMPLE_DIGEST}\n`);
  });

  it('should scan the root with --oneshot', async () => {
    await fs.outputFile(path.join(root, 'data-lake/logs/RUN/log.txt'), 'ok');

    const code = await run('update', '--oneshot');

    expect(code).toBe(ExitCodes.OK);
    expect(await fs.pathExists(path.join(root, 'data-lake/logs/RUN/log.txt.sha256'))).toBe(true);
    expect(await fs.pathExists(path.join(root, `${SAMPLE}.sha256`))).toBe(true);
  });

  it('should verify silently after update', async () => {
    await run('update', '--oneshot');
    stdout = [];

    const code = await run('verify', SAMPLE);

    expect(code).toBe(ExitCodes.OK);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it('should exit 1 and name the tampered file', async () => {
    await run('update', '--oneshot');
    await fs.writeFile(path.join(root, SAMPLE), 'a,b\n1,3\n');

    const code = await run('verify', '--oneshot');

    expect(code).toBe(ExitCodes.VIOLATIONS);
    expect(stderr).toEqual([
      `DigestMismatch ${SAMPLE}\n`,
      '1 of 1 file(s) failed integrity verification\n',
    ]);
  });

  it('should report missing sidecars', async () => {
    const code = await run('verify', SAMPLE);

    expect(code).toBe(ExitCodes.VIOLATIONS);
    expect(stderr[0]).toBe(`MissingSidecar ${SAMPLE}\n`);
  });

  it('should exit 2 when a passed file cannot be read', async () => {
    const missing = 'data-lake/raw/AB12/missing.csv';

    const code = await run('update', missing);

    expect(code).toBe(ExitCodes.FAILURE);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toContain(`IOFailureError: Failed to read ${path.join(root, missing)}`);
  });

  it('should exit 2 on an invalid algorithm', async () => {
    const code = await run('--algorithm', 'md5', 'verify');

    expect(code).toBe(ExitCodes.FAILURE);
  });

  it('should run a state probe through the injected runner', async () => {
    await fs.writeFile(path.join(root, 'environment.yml'), 'name: lake\n');
    io.runner = async () => 'name: other\n';

    const code = await run(
      'check-state',
      path.join(root, 'environment.yml'),
      'conda',
      'env',
      'export',
    );

    expect(code).toBe(ExitCodes.VIOLATIONS);
    expect(stderr).toEqual([
      `${path.join(root, 'environment.yml')} differs from command output at line 1\n`,
    ]);
  });

  it('should stop watching on shutdown', async () => {
    io.waitForShutdown = () => Promise.resolve();

    await expect(run('watch', '--debounce', '50')).resolves.toBe(ExitCodes.OK);
  });

  describe('log level', () => {
    const savedLogLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (savedLogLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = savedLogLevel;
      }
    });

    it('should take LOG_LEVEL from the given environment', async () => {
      io.env = { LOG_LEVEL: 'debug' };

      await run('verify', '--oneshot');

      expect(logger.level).toBe('debug');
    });

    it('should fall back to the process environment', async () => {
      io.env = undefined;
      process.env.LOG_LEVEL = 'warn';

      await run('verify', '--oneshot');

      expect(logger.level).toBe('warn');
    });

    it('should let --log-level win over LOG_LEVEL', async () => {
      io.env = { LOG_LEVEL: 'debug' };

      await run('--log-level', 'error', 'verify', '--oneshot');

      expect(logger.level).toBe('error');
    });
  });
});
