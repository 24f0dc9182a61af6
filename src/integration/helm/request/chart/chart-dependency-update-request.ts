// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to update the dependencies of a Helm chart.
 */
export class ChartDependencyUpdateRequest implements HelmRequest {
  public constructor(readonly chartDirectory: string) {
    if (!chartDirectory) {
      throw new MissingArgumentError('chartDirectory must not be null');
    }
    if (chartDirectory.trim() === '') {
      throw new MissingArgumentError('chartDirectory must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    return builder.subcommands('dependency', 'update').positional(this.chartDirectory);
  }

  public failureMessage(): string {
    return `Unable to update dependencies of chart at ${this.chartDirectory}`;
  }
}
