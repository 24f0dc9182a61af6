// SPDX-License-Identifier: Apache-2.0

import {PipelineError} from './pipeline-error.js';

export class UserBreak extends PipelineError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
