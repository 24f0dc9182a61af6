// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type Options} from '../options.js';

/**
 * The options to be supplied to the helm template command.
 *
 * @param values          - values files to render the chart with, in order.
 * @param outputDirectory - writes the rendered templates to files in this directory instead of standard output.
 */
export class TemplateChartOptions implements Options {
  public static readonly DEFAULT = new TemplateChartOptions([], null);

  public constructor(
    public readonly values: readonly string[],
    public readonly outputDirectory: string | null,
  ) {}

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    return builder.optionsWithMultipleValues('values', this.values).argument('output-dir', this.outputDirectory);
  }
}
