// SPDX-License-Identifier: Apache-2.0

import {PipelineError} from './pipeline-error.js';

/**
 * Raised while the configuration is loaded, before any chart is touched. Never retried.
 */
export class ConfigurationError extends PipelineError {
  /**
   * @param message - error message
   * @param key - the configuration key at fault (if any)
   * @param cause - source error (if any)
   */
  public constructor(message: string, key?: string, cause?: unknown) {
    super(message, cause, key ? {key} : {});
  }
}
