// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {type PackageChartOptions} from '../../model/package/package-chart-options.js';
import {PackageChartOptionsBuilder} from '../../model/package/package-chart-options-builder.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to package a chart directory into a versioned chart archive.
 */
export class ChartPackageRequest implements HelmRequest {
  public constructor(
    public readonly chartDirectory: string,
    public readonly options: PackageChartOptions = PackageChartOptionsBuilder.builder().build(),
  ) {
    if (!chartDirectory || chartDirectory.trim() === '') {
      throw new MissingArgumentError('chartDirectory must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    return this.options.apply(builder.subcommands('package').positional(this.chartDirectory));
  }

  public failureMessage(): string {
    return `Unable to package chart at ${this.chartDirectory}`;
  }
}
