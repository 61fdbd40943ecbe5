/**
 * Command Executor
 *
 * Runs user-supplied shell commands and measures their wall-clock latency.
 */

import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import { FILE_PLACEHOLDER } from '../config/index.js';
import type { CommandOutcome } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CommandExecutor');

/**
 * A shell command template with a single substitution: the placeholder token
 * is replaced by the target file path. No other templating, quoting or
 * escaping is applied, so templates stay free-form shell pipelines.
 */
export class TemplatedCommand {
  readonly template: string;
  readonly placeholder: string;

  constructor(template: string, placeholder: string = FILE_PLACEHOLDER) {
    this.template = template;
    this.placeholder = placeholder;
  }

  /**
   * Substitute every occurrence of the placeholder with `filePath`
   */
  render(filePath: string): string {
    // split/join avoids String.replace's `$&`-style patterns in paths
    return this.template.split(this.placeholder).join(filePath);
  }
}

/**
 * Executes one fully rendered command
 *
 * Implementations must resolve for every outcome, launch failures included.
 */
export interface CommandExecutor {
  execute(command: string): Promise<CommandOutcome>;
}

/**
 * Runs commands through the system shell (`/bin/sh` or `cmd.exe`)
 *
 * Latency spans spawn to process exit, so it includes shell start-up and
 * teardown: the observable cost of the external tool.
 */
export class ShellCommandExecutor implements CommandExecutor {
  execute(command: string): Promise<CommandOutcome> {
    return new Promise((resolve) => {
      const stderrChunks: Buffer[] = [];
      let settled = false;
      let endTime: bigint | undefined;

      const finish = (outcome: Omit<CommandOutcome, 'latencyNs'>): void => {
        if (settled) return;
        settled = true;
        const latencyNs = (endTime ?? process.hrtime.bigint()) - startTime;
        resolve({ ...outcome, latencyNs });
      };

      const startTime = process.hrtime.bigint();
      let child: ChildProcessByStdio<null, null, Readable>;
      try {
        child = spawn(command, {
          shell: true,
          stdio: ['ignore', 'ignore', 'pipe'],
        });
      } catch (err) {
        // E2BIG, NUL bytes and similar are thrown synchronously
        endTime = process.hrtime.bigint();
        const message = err instanceof Error ? err.message : String(err);
        logger.debug({ err, command: command.slice(0, 200) }, 'Command failed to launch');
        finish({ success: false, error: message || 'Command failed to launch' });
        return;
      }

      child.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on('exit', () => {
        endTime = process.hrtime.bigint();
      });

      child.on('error', (err) => {
        endTime ??= process.hrtime.bigint();
        logger.debug({ err, command }, 'Command failed to launch');
        finish({ success: false, error: err.message || 'Command failed to launch' });
      });

      // 'close' fires after stderr is drained
      child.on('close', (code, signal) => {
        if (code === 0) {
          finish({ success: true, error: '' });
          return;
        }

        const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim();
        const fallback =
          signal !== null
            ? `Command terminated by signal ${signal}`
            : `Command exited with status ${code ?? 'unknown'}`;
        finish({ success: false, error: stderr || fallback });
      });
    });
  }
}
