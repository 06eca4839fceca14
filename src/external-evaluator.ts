/**
 * Highest-fidelity tier: let a real interpreter evaluate the literal
 *
 * The literal is written into a throwaway script that prints it back as JSON.
 * The interpreter is optional; a missing binary, non-zero exit, timeout or
 * unreadable output all become a failed outcome and the chain moves on.
 */

import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULTS } from './constants.js';
import { ExternalToolUnavailableError, NormalizationError, toError } from './errors.js';
import { SilentLogger, type Logger } from './logger.js';
import { toNodeList, type FidelityTier, type ParseStrategy, type StrategyInput, type StrategyOutcome } from './types/apidoc.js';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the child was killed for writing more than maxBuffer */
  outputTooLarge?: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
  maxBuffer: number;
}

/**
 * Runs a command to completion. Rejects with ExternalToolUnavailableError when
 * the command cannot be started at all.
 */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { timeout: options.timeoutMs, maxBuffer: options.maxBuffer, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        if (error.code === 'ENOENT' || error.code === 'EACCES') {
          reject(new ExternalToolUnavailableError(command, error.message));
          return;
        }

        if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          resolve({ exitCode: null, stdout, stderr, timedOut: false, outputTooLarge: true });
          return;
        }

        resolve({
          exitCode: typeof error.code === 'number' ? error.code : null,
          stdout,
          stderr,
          timedOut: error.killed === true,
        });
      }
    );
  });

export interface ExternalEvaluatorOptions {
  /** Interpreter binary; defaults to the Node.js running this process */
  command?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Script handed to the interpreter. CommonJS extension so no surrounding
 * package.json can change how it loads.
 */
export function buildEvaluationScript(literal: string): string {
  return `const apiSchema = ${literal};\nprocess.stdout.write(JSON.stringify(apiSchema));\n`;
}

export class ExternalEvaluator implements ParseStrategy {
  readonly tier: FidelityTier = 'evaluated';
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: ExternalEvaluatorOptions = {}) {
    this.command = options.command ?? process.execPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.EVALUATOR_TIMEOUT_MS;
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? new SilentLogger();
  }

  async attempt(input: StrategyInput): Promise<StrategyOutcome> {
    let workDir: string | undefined;

    try {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'apidoc-eval-'));
      const scriptPath = path.join(workDir, 'evaluate.cjs');
      await fs.writeFile(scriptPath, buildEvaluationScript(input.literal), 'utf-8');

      const result = await this.runner(this.command, [scriptPath], {
        timeoutMs: this.timeoutMs,
        maxBuffer: DEFAULTS.EVALUATOR_MAX_BUFFER_BYTES,
      });

      if (result.outputTooLarge) {
        return {
          ok: false,
          error: new NormalizationError(
            'evaluated',
            `interpreter output exceeded ${DEFAULTS.EVALUATOR_MAX_BUFFER_BYTES} bytes`
          ),
        };
      }

      if (result.timedOut) {
        return {
          ok: false,
          error: new NormalizationError('evaluated', `interpreter timed out after ${this.timeoutMs} ms`),
        };
      }

      if (result.exitCode !== 0) {
        return {
          ok: false,
          error: new NormalizationError('evaluated', `interpreter exited with code ${result.exitCode}`, {
            stderr: result.stderr.trim().slice(0, 2000),
          }),
        };
      }

      return { ok: true, nodes: toNodeList(this.decodeOutput(result.stdout)) };
    } catch (error) {
      return { ok: false, error: toError(error) };
    } finally {
      if (workDir) {
        await this.cleanup(workDir);
      }
    }
  }

  private decodeOutput(stdout: string): unknown {
    try {
      return JSON.parse(stdout);
    } catch (error) {
      throw new NormalizationError('evaluated', `interpreter output is not JSON: ${toError(error).message}`);
    }
  }

  private async cleanup(workDir: string): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Failed to remove evaluator work directory', {
        workDir,
        error: toError(error).message,
      });
    }
  }
}
