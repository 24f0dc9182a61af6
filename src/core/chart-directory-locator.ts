// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import * as constants from './constants.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type PipelineLogger} from './logging/pipeline-logger.js';
import {ConfigurationError} from './errors/configuration-error.js';
import {PathEx} from '../business/utils/path-ex.js';
import {Regex} from '../business/utils/regex.js';

/**
 * Finds the chart directories below the configured chart roots.
 *
 * A chart directory is a directory holding a `Chart.yaml`; its own subdirectories (`charts/`, `templates/`, ...) are
 * not searched. Directories are visited depth-first with entries sorted by name, so the sequence is lexicographic and
 * the same on every run. Roots are visited in the order they are configured.
 */
@injectable()
export class ChartDirectoryLocator {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  /**
   * Lazily yields the chart directories; nothing below a root is read before the previous chart has been consumed.
   *
   * @param roots - chart roots, absolute or relative to `baseDirectory`; yielded paths keep the form of their root
   * @param excludes - globs matched against paths relative to `baseDirectory` using forward slashes
   * @param baseDirectory - the project directory
   * @throws ConfigurationError if a root does not exist or is not a directory
   */
  public *locate(roots: readonly string[], excludes: readonly string[], baseDirectory: string): Generator<string> {
    const excludePatterns = excludes.map(glob => Regex.fromGlob(glob));

    for (const root of roots) {
      const absoluteRoot = PathEx.resolveAgainst(baseDirectory, root);
      if (!fs.existsSync(absoluteRoot) || !fs.statSync(absoluteRoot).isDirectory()) {
        throw new ConfigurationError(`Chart directory ${root} does not exist or is not a directory`, 'chartDirectory');
      }
      yield* this.walk(root, absoluteRoot, baseDirectory, excludePatterns);
    }
  }

  private *walk(
    directory: string,
    absoluteDirectory: string,
    baseDirectory: string,
    excludePatterns: readonly RegExp[],
  ): Generator<string> {
    const relative = PathEx.relativePosix(baseDirectory, absoluteDirectory);
    if (excludePatterns.some(pattern => pattern.test(relative))) {
      this.logger.debug(`Skip excluded directory ${directory}`);
      return;
    }

    if (fs.existsSync(PathEx.join(absoluteDirectory, constants.CHART_DESCRIPTOR_FILE))) {
      yield directory;
      return;
    }

    const children = fs
      .readdirSync(absoluteDirectory, {withFileTypes: true})
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const child of children) {
      yield* this.walk(PathEx.join(directory, child), PathEx.join(absoluteDirectory, child), baseDirectory, excludePatterns);
    }
  }
}
