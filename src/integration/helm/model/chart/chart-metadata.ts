// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as yaml from 'yaml';
import * as constants from '../../../../core/constants.js';
import {PathEx} from '../../../../business/utils/path-ex.js';
import {PipelineError} from '../../../../core/errors/pipeline-error.js';

export class ChartMetadata {
  /**
   * Creates a new ChartMetadata instance.
   * @param name The name of the chart
   * @param version The version of the chart
   * @param appVersion The version of the application contained in the chart
   */
  public constructor(
    public readonly name: string,
    public readonly version: string,
    public readonly appVersion?: string,
  ) {}

  /**
   * Reads the chart descriptor of the given chart directory.
   * @throws PipelineError if the descriptor cannot be read or lacks a name or version
   */
  public static load(chartDirectory: string): ChartMetadata {
    const descriptor = PathEx.join(chartDirectory, constants.CHART_DESCRIPTOR_FILE);

    let parsed: unknown;
    try {
      // failsafe keeps every scalar as written, `version: 1.10` stays "1.10"
      parsed = yaml.parse(fs.readFileSync(descriptor, 'utf8'), {schema: 'failsafe'});
    } catch (error) {
      throw new PipelineError(`Unable to read chart descriptor ${descriptor}`, error);
    }

    if (!isMapping(parsed)) {
      throw new PipelineError(`Chart descriptor ${descriptor} is not a mapping`);
    }

    const {name, version, appVersion} = parsed;
    if (typeof name !== 'string' || name.trim() === '') {
      throw new PipelineError(`Chart descriptor ${descriptor} has no name`);
    }
    if (typeof version !== 'string' || version.trim() === '') {
      throw new PipelineError(`Chart descriptor ${descriptor} has no version`);
    }

    return new ChartMetadata(name, version, typeof appVersion === 'string' && appVersion !== '' ? appVersion : undefined);
  }
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
