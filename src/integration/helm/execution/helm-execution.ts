// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {ExternalToolError} from '../../../core/errors/external-tool-error.js';
import {LaunchError} from '../../../core/errors/launch-error.js';
import {PipelineError} from '../../../core/errors/pipeline-error.js';

/**
 * Represents the execution of a helm command.
 *
 * The process is started by {@link call}. There is no timeout: a helm process that never exits blocks the caller.
 */
export class HelmExecution {
  /**
   * The message used when the caller does not describe what the command was doing.
   */
  private static readonly DEFAULT_FAILURE_MESSAGE = 'Execution of the helm command failed';

  private output = '';
  private errOutput = '';
  private exitCodeValue: number | null = null;

  /**
   * Creates a new HelmExecution instance.
   * @param command The command array to execute, starting with the executable
   * @param workingDirectory The working directory for the process
   * @param input Content written to the standard input of the process, which is then closed
   */
  public constructor(
    private readonly command: readonly string[],
    private readonly workingDirectory: string,
    private readonly input?: string,
  ) {}

  /**
   * Runs the command and waits for it to exit.
   * @param failureMessage describes the operation in the error raised on a non-zero exit code
   * @throws ExternalToolError when the process exits with a non-zero exit code
   * @throws LaunchError when the process cannot be started
   */
  public async call(failureMessage: string = HelmExecution.DEFAULT_FAILURE_MESSAGE): Promise<void> {
    const [executable, ...arguments_] = this.command;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const child = spawn(executable, arguments_, {
        cwd: this.workingDirectory,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      child.on('error', error => settle(new LaunchError(executable, error)));

      // decoded once the process closed, lines and characters may span chunks
      const outChunks: Buffer[] = [];
      const errChunks: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => outChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => errChunks.push(chunk));

      // a process that exits without reading its input breaks the pipe, the exit code tells the outcome
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') {
          settle(new PipelineError(`Unable to write to the standard input of '${executable}'`, error));
        }
      });
      child.stdin.end(this.input);

      child.on('close', code => {
        this.output = HelmExecution.decode(outChunks);
        this.errOutput = HelmExecution.decode(errChunks);
        this.exitCodeValue = code;
        if (code === 0) {
          settle();
        } else {
          settle(new ExternalToolError(failureMessage, code ?? 1, this.standardOutput(), this.standardError()));
        }
      });
    });
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  /**
   * Gets the standard output of the process with `\n` line endings and without the trailing line break.
   */
  public standardOutput(): string {
    return this.output;
  }

  /**
   * Gets the standard error of the process with `\n` line endings and without the trailing line break.
   */
  public standardError(): string {
    return this.errOutput;
  }

  private static decode(chunks: readonly Buffer[]): string {
    return Buffer.concat(chunks).toString('utf8').replaceAll('\r\n', '\n').replace(/\n+$/, '');
  }
}
