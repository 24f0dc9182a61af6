// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {TemplateChartOptions} from '../../model/template/template-chart-options.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to render the templates of a chart locally.
 */
export class ChartTemplateRequest implements HelmRequest {
  public constructor(
    public readonly chartDirectory: string,
    public readonly options: TemplateChartOptions = TemplateChartOptions.DEFAULT,
  ) {
    if (!chartDirectory || chartDirectory.trim() === '') {
      throw new MissingArgumentError('chartDirectory must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    return this.options.apply(builder.subcommands('template').positional(this.chartDirectory));
  }

  public failureMessage(): string {
    return `There are errors rendering chart at ${this.chartDirectory}`;
  }
}
