// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type Options} from '../options.js';

/**
 * The options to be supplied to the helm lint command.
 *
 * @param strict - fail on lint warnings.
 * @param values - values files to lint the chart with, in order.
 */
export class LintChartOptions implements Options {
  public static readonly DEFAULT = new LintChartOptions(false, []);

  public constructor(
    public readonly strict: boolean,
    public readonly values: readonly string[],
  ) {}

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    const result = this.strict ? builder.flag('strict') : builder;
    return result.optionsWithMultipleValues('values', this.values);
  }
}
