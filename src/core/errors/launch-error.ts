// SPDX-License-Identifier: Apache-2.0

import {PipelineError} from './pipeline-error.js';

/**
 * The external executable could not be started at all (missing, not executable, ...).
 */
export class LaunchError extends PipelineError {
  public constructor(
    public readonly executable: string,
    cause?: unknown,
  ) {
    super(
      `Unable to launch '${executable}': ${LaunchError.reason(cause)}. ` +
        'Check that helm is installed and on the PATH, or point --helm-executable at it.',
      cause,
      {executable},
    );
  }

  private static reason(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause ?? 'unknown reason');
  }
}
