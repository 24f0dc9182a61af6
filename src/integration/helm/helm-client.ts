// SPDX-License-Identifier: Apache-2.0

import {type PackageChartOptions} from './model/package/package-chart-options.js';
import {type LintChartOptions} from './model/lint/lint-chart-options.js';
import {type TemplateChartOptions} from './model/template/template-chart-options.js';

/**
 * The HelmClient is a bridge between TypeScript and the Helm CLI. The client is highly dependent on specific features
 * and versions of the Helm CLI tools; therefore, all implementations are expected to provide a packaged Helm executable
 * of the appropriate version for each supported OS and architecture.
 *
 * Every method rejects with an ExternalToolError when helm exits with a non-zero exit code and with a LaunchError when
 * the helm executable cannot be started.
 */
export interface HelmClient {
  /**
   * Executes the Helm CLI package sub-command and writes a versioned chart archive.
   * @param chartDirectory the chart directory to package
   * @param options the options for the package command
   */
  packageChart(chartDirectory: string, options: PackageChartOptions): Promise<void>;

  /**
   * Executes the Helm CLI lint sub-command.
   * @param chartDirectory the chart directory to lint
   * @param options the options for the lint command
   */
  lintChart(chartDirectory: string, options: LintChartOptions): Promise<void>;

  /**
   * Executes the Helm CLI template sub-command.
   * @param chartDirectory the chart directory to render
   * @param options the options for the template command
   * @returns the rendered manifests, empty when an output directory is set
   */
  templateChart(chartDirectory: string, options: TemplateChartOptions): Promise<string>;

  /**
   * Executes the Helm CLI dependency update sub-command.
   * @param chartDirectory the chart directory whose dependencies are updated
   */
  dependencyUpdate(chartDirectory: string): Promise<void>;
}
