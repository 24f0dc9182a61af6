// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type PipelineLogger} from '../logging/pipeline-logger.js';
import {PlaceholderWriteError} from '../errors/placeholder-write-error.js';
import {type ArtifactRegistry} from './artifact-registry.js';
import {type ModuleIdentity} from './module-identity.js';

export interface PlaceholderWriteResult {
  readonly path: string;
  readonly written: boolean;
  readonly registered: boolean;
  readonly error?: PlaceholderWriteError;
}

/**
 * Writes the stand-in artifact file that lets the build graph track a chart module without holding chart archives,
 * and registers it as the module's artifact.
 *
 * Failures are logged and reported in the result; they never fail the packaging run.
 */
@injectable()
export class PlaceholderArtifactWriter {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  public static content(module: ModuleIdentity): string {
    return [
      'This is NOT the file you are looking for!',
      '',
      'To take advantage of the build graph, a descriptor file is published for this module.',
      'The build graph is not the right solution for managing Helm dependencies.',
      '',
      `Please check your Helm repository for the ${module.name} chart instead!`,
      '',
    ].join('\n');
  }

  public writePlaceholder(file: string, module: ModuleIdentity, registry: ArtifactRegistry): PlaceholderWriteResult {
    try {
      fs.mkdirSync(path.dirname(file), {recursive: true});
      fs.writeFileSync(file, PlaceholderArtifactWriter.content(module));
    } catch (error) {
      return this.failed(file, false, error);
    }

    try {
      registry.setArtifactFile(module, file);
    } catch (error) {
      return this.failed(file, true, error);
    }

    this.logger.debug(`Placeholder artifact for ${module.name} written to ${file}`);
    return {path: file, written: true, registered: true};
  }

  private failed(file: string, written: boolean, cause: unknown): PlaceholderWriteResult {
    const error = new PlaceholderWriteError(file, cause);
    this.logger.warn(error.message, cause);
    return {path: file, written, registered: false, error};
  }
}
