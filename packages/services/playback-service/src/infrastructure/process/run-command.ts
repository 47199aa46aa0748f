import { execFile } from 'child_process';
import { promisify } from 'util';
import { DomainError, DomainErrorCode, toError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';

const execFileAsync = promisify(execFile);
const logger = getLogger('playback-service-run-command');

const STDERR_TAIL_CHARS = 2000;
const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  maxBuffer?: number;
}

function stderrOf(error: Error): string {
  return 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.slice(-STDERR_TAIL_CHARS) : '';
}

/**
 * Run an external tool without a shell. Non-zero exit, timeout or spawn
 * failure reject with a DomainError carrying the stderr tail.
 */
export async function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const startedAt = Date.now();
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      encoding: 'utf8',
      timeout: options.timeoutMs ?? 0,
      maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
      windowsHide: true,
    });
    logger.debug('Command finished', { command, durationMs: Date.now() - startedAt });
    return { stdout, stderr };
  } catch (error) {
    const cause = toError(error);
    const timedOut = 'killed' in cause && cause.killed === true;
    throw new DomainError(
      timedOut ? `${command} timed out after ${options.timeoutMs}ms` : `${command} failed: ${cause.message}`,
      502,
      cause,
      timedOut ? DomainErrorCode.TIMEOUT : DomainErrorCode.EXTERNAL_SERVICE_ERROR,
      { command, stderr: stderrOf(cause) }
    );
  }
}
