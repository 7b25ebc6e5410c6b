/**
 * CLI entry point tests
 *
 * Runs src/cli/index.ts in a child Node process through the tsx loader.
 */

import { describe, it, before, after } from 'mocha';
import { strict as assert } from 'assert';
import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

const ROOT = path.resolve(__dirname, '..', '..', '..');
const CLI = path.join(ROOT, 'src', 'cli', 'index.ts');

function runCli(args: string[]): Promise<{ stdout: string; stderr: string }> {
  return execFileAsync(process.execPath, ['--import', 'tsx', CLI, ...args], { cwd: ROOT });
}

function exitedWith(code: number, stderrPart: string): (error: unknown) => boolean {
  return (error: unknown) =>
    error instanceof Error &&
    'code' in error && error.code === code &&
    'stderr' in error && typeof error.stderr === 'string' && error.stderr.includes(stderrPart);
}

describe('CLI', () => {
  let tmpDir: string;
  let profilesFile: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-cli-'));
    profilesFile = path.join(tmpDir, 'profiles.json');
    fs.writeFileSync(profilesFile, JSON.stringify({
      profiles: {
        beta: { command: process.execPath, args: ['-e', "console.log('hi'); console.log('all done')"] },
        alpha: { command: process.execPath, args: ['-e', 'process.exit(2)'] },
      },
    }));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints the package version', async () => {
    const { stdout } = await runCli(['--version']);
    assert.equal(stdout, '1.0.0\n');
  });

  it('lists profiles', async () => {
    const { stdout } = await runCli(['profiles', '--profiles', profilesFile]);
    assert.equal(stdout, 'alpha\nbeta\n');
  });

  it('runs a profile in the foreground and prints records as JSON lines', async () => {
    const { stdout, stderr } = await runCli(['run', 'beta', '--profiles', profilesFile, '--json']);

    const records = stdout.trim().split('\n').map(line => JSON.parse(line));
    assert.deepEqual(
      records.map(r => [r.sequence, r.level, r.text]),
      [[1, 'info', 'hi'], [2, 'success', 'all done']]
    );
    assert.match(stderr, /run_[0-9a-f-]+ COMPLETED/);
  });

  it('exits non-zero when the run fails', async () => {
    await assert.rejects(
      runCli(['run', 'alpha', '--profiles', profilesFile]),
      exitedWith(1, '[E302] Script exited abnormally: exit code 2')
    );
  });

  it('reports an unknown profile as JSON on stderr', async () => {
    await assert.rejects(
      runCli(['run', 'gamma', '--profiles', profilesFile]),
      exitedWith(1, '"name": "CONFIG_NOT_FOUND"')
    );
  });

  it('prints usage errors with the help text', async () => {
    await assert.rejects(runCli(['run']), exitedWith(1, 'Error: run requires a profile name'));
  });
});
