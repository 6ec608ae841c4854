/**
 * Browser Provisioner
 *
 * Makes sure the Chromium build Playwright drives is installed before the
 * first launch, by running Playwright's own CLI. Any failure here is fatal
 * to session startup and surfaces as a ProvisioningFailure.
 */

import { execFile } from 'node:child_process';
import { writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import path from 'node:path';
import { promisify } from 'node:util';
import { ProvisioningFailure, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.provisioner;

export interface Provisioner {
  ensureInstalled(): Promise<void>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: 'utf8',
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/**
 * Locate Playwright's CLI script next to its package.json
 */
function resolvePlaywrightCli(): string {
  const require = createRequire(import.meta.url);
  try {
    return path.join(path.dirname(require.resolve('playwright/package.json')), 'cli.js');
  } catch (error) {
    throw new ProvisioningFailure(
      `Playwright is not installed: ${describeError(error)}. Install it with: npm install playwright`,
      {},
      { cause: error }
    );
  }
}

function readOutput(error: unknown, key: 'stdout' | 'stderr'): string | undefined {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return value === undefined || value === null ? undefined : String(value);
  }
  return undefined;
}

function readExitCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const value: unknown = error.code;
    if (typeof value === 'number' || typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

export interface PlaywrightProvisionerOptions {
  /** Also run `playwright install-deps chromium` (needs root on Linux) */
  installDeps?: boolean;
  /** Write the installer's output here when it fails */
  errorLogPath?: string;
  runner?: CommandRunner;
  /** Path of Playwright's cli.js; resolved from node_modules when omitted */
  cliPath?: string;
}

export class PlaywrightProvisioner implements Provisioner {
  private readonly runner: CommandRunner;

  constructor(private readonly options: PlaywrightProvisionerOptions = {}) {
    this.runner = options.runner ?? runCommand;
  }

  async ensureInstalled(): Promise<void> {
    const cli = this.options.cliPath ?? resolvePlaywrightCli();

    await this.run(cli, ['install', 'chromium']);
    if (this.options.installDeps) {
      await this.run(cli, ['install-deps', 'chromium']);
    }
  }

  private async run(cli: string, args: string[]): Promise<void> {
    const command = `playwright ${args.join(' ')}`;
    const startTime = Date.now();

    try {
      await this.runner(process.execPath, [cli, ...args]);
      log.timed('Provisioning step finished', startTime, { command });
    } catch (error) {
      const failure = new ProvisioningFailure(
        `Browser provisioning failed running "${command}": ${describeError(error)}`,
        {
          command,
          exitCode: readExitCode(error),
          stdout: readOutput(error, 'stdout'),
          stderr: readOutput(error, 'stderr'),
        },
        { cause: error }
      );
      log.error('Browser provisioning failed', { command, exitCode: failure.details.exitCode, error });
      await this.writeErrorLog(failure);
      throw failure;
    }
  }

  private async writeErrorLog(failure: ProvisioningFailure): Promise<void> {
    const target = this.options.errorLogPath;
    if (!target) {
      return;
    }

    const { command, exitCode, stdout, stderr } = failure.details;
    const body = [
      'Playwright installation failed!',
      `Command: ${command ?? ''}`,
      `Exit code: ${exitCode ?? 'unknown'}`,
      'Stdout:',
      stdout ?? '',
      'Stderr:',
      stderr ?? '',
      '',
    ].join('\n');

    try {
      await writeFile(target, body, 'utf8');
    } catch (error) {
      log.error('Could not write provisioning error log', { path: target, error });
    }
  }
}

/**
 * Provisioner used when the browser is known to be present
 */
export class NoopProvisioner implements Provisioner {
  async ensureInstalled(): Promise<void> {
    log.debug('Provisioning skipped');
  }
}
