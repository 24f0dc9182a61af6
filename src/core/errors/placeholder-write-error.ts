// SPDX-License-Identifier: Apache-2.0

import {PipelineError} from './pipeline-error.js';

export class PlaceholderWriteError extends PipelineError {
  public constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`Could not create placeholder artifact file: ${path}`, cause, {path});
  }
}
