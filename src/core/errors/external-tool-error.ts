// SPDX-License-Identifier: Apache-2.0

import {PipelineError} from './pipeline-error.js';

/**
 * Thrown when the external tool ran but exited with a non-zero exit code.
 */
export class ExternalToolError extends PipelineError {
  /**
   * @param contextMessage - what the caller was trying to do, e.g. "Unable to package chart at charts/a"
   * @param exitCode - the non-zero exit code of the process
   * @param stdOut - captured standard output
   * @param stdErr - captured standard error
   */
  public constructor(
    public readonly contextMessage: string,
    private readonly exitCode: number,
    private readonly stdOut: string = '',
    private readonly stdErr: string = '',
  ) {
    super(ExternalToolError.format(contextMessage, exitCode, stdOut, stdErr), undefined, {exitCode});
  }

  private static format(contextMessage: string, exitCode: number, stdOut: string, stdErr: string): string {
    const output = [stdErr, stdOut].filter(part => part.trim() !== '').join('\n');
    const message = `${contextMessage} (exit code ${exitCode})`;
    return output ? `${message}\n${output}` : message;
  }

  public getExitCode(): number {
    return this.exitCode;
  }

  public getStdOut(): string {
    return this.stdOut;
  }

  public getStdErr(): string {
    return this.stdErr;
  }

  public toString(): string {
    return `ExternalToolError{message=${this.contextMessage}, exitCode=${this.exitCode}, stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`;
  }
}
