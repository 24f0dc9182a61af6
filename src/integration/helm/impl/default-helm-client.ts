// SPDX-License-Identifier: Apache-2.0

import {type HelmClient} from '../helm-client.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type HelmExecution} from '../execution/helm-execution.js';
import {type HelmRequest} from '../request/helm-request.js';
import {ChartPackageRequest} from '../request/chart/chart-package-request.js';
import {ChartLintRequest} from '../request/chart/chart-lint-request.js';
import {ChartTemplateRequest} from '../request/chart/chart-template-request.js';
import {ChartDependencyUpdateRequest} from '../request/chart/chart-dependency-update-request.js';
import {type PackageChartOptions} from '../model/package/package-chart-options.js';
import {type LintChartOptions} from '../model/lint/lint-chart-options.js';
import {type TemplateChartOptions} from '../model/template/template-chart-options.js';
import {type PipelineLogger} from '../../../core/logging/pipeline-logger.js';

/**
 * The default implementation of the HelmClient interface.
 */
export class DefaultHelmClient implements HelmClient {
  /**
   * @param baseBuilder - builder carrying the executable and working directory shared by all requests
   * @param logger - the logger
   */
  public constructor(
    private readonly baseBuilder: HelmExecutionBuilder,
    private readonly logger: PipelineLogger,
  ) {}

  public async packageChart(chartDirectory: string, options: PackageChartOptions): Promise<void> {
    await this.execute(new ChartPackageRequest(chartDirectory, options));
  }

  public async lintChart(chartDirectory: string, options: LintChartOptions): Promise<void> {
    await this.execute(new ChartLintRequest(chartDirectory, options));
  }

  public async templateChart(chartDirectory: string, options: TemplateChartOptions): Promise<string> {
    const execution = await this.execute(new ChartTemplateRequest(chartDirectory, options));
    return execution.standardOutput();
  }

  public async dependencyUpdate(chartDirectory: string): Promise<void> {
    await this.execute(new ChartDependencyUpdateRequest(chartDirectory));
  }

  /**
   * Executes the given request and waits for helm to exit.
   *
   * @param request - The request to execute
   * @returns the finished execution, to read its output from
   */
  private async execute<T extends HelmRequest>(request: T): Promise<HelmExecution> {
    const execution = request.apply(this.baseBuilder).build();
    await execution.call(request.failureMessage());
    this.logger.debug(`${request.constructor.name} finished`, {stdOut: execution.standardOutput()});
    return execution;
  }
}
