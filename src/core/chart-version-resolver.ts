// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from './constants.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type PipelineLogger} from './logging/pipeline-logger.js';
import {type TimestampPattern} from './time/timestamp-pattern.js';

/**
 * Computes the effective chart version.
 *
 * A configured version takes precedence over the version read from the chart metadata. When no version is known at all
 * `null` is returned and the `--version` flag is left out, so helm falls back to the version in `Chart.yaml`.
 *
 * With timestamping enabled, a version ending in `-SNAPSHOT` has its `SNAPSHOT` qualifier replaced by the formatted
 * timestamp, e.g. `1.2.0-SNAPSHOT` becomes `1.2.0-20240102030405`. The result stays a valid semantic version.
 */
@injectable()
export class ChartVersionResolver {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  public resolve(
    explicitVersion: string | undefined,
    chartMetadataVersion: string | undefined,
    timestampEnabled: boolean,
    timestampPattern: TimestampPattern,
    now: Date,
  ): string | null {
    let version = explicitVersion || chartMetadataVersion || null;
    if (version === null) {
      return null;
    }

    if (timestampEnabled && ChartVersionResolver.isSnapshot(version)) {
      const timestamp = timestampPattern.format(now);
      version = version.slice(0, -constants.SNAPSHOT_QUALIFIER.length) + timestamp;
      this.logger.debug(`Replaced ${constants.SNAPSHOT_QUALIFIER} qualifier with timestamp ${timestamp}`);
    }

    return version;
  }

  public static isSnapshot(version: string): boolean {
    return version.endsWith(constants.SNAPSHOT_SUFFIX);
  }
}
