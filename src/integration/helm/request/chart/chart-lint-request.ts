// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {LintChartOptions} from '../../model/lint/lint-chart-options.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to examine a chart for possible issues.
 */
export class ChartLintRequest implements HelmRequest {
  public constructor(
    public readonly chartDirectory: string,
    public readonly options: LintChartOptions = LintChartOptions.DEFAULT,
  ) {
    if (!chartDirectory || chartDirectory.trim() === '') {
      throw new MissingArgumentError('chartDirectory must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    return this.options.apply(builder.subcommands('lint').positional(this.chartDirectory));
  }

  public failureMessage(): string {
    return `There are test failures for chart at ${this.chartDirectory}`;
  }
}
