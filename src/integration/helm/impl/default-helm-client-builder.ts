// SPDX-License-Identifier: Apache-2.0

import {type HelmClientBuilder} from '../helm-client-builder.js';
import {type HelmClient} from '../helm-client.js';
import {DefaultHelmClient} from './default-helm-client.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type PipelineLogger} from '../../../core/logging/pipeline-logger.js';
import {ConfigurationError} from '../../../core/errors/configuration-error.js';
import * as constants from '../../../core/constants.js';

/**
 * The default implementation of the HelmClientBuilder interface.
 */
export class DefaultHelmClientBuilder implements HelmClientBuilder {
  private _helmExecutable: string = constants.HELM;
  private _workingDirectory: string = process.cwd();

  public constructor(private readonly logger: PipelineLogger) {}

  public helmExecutable(helmExecutable: string): HelmClientBuilder {
    this._helmExecutable = helmExecutable;
    return this;
  }

  public workingDirectory(workingDirectory: string): HelmClientBuilder {
    this._workingDirectory = workingDirectory;
    return this;
  }

  public build(): HelmClient {
    if (!this._helmExecutable || this._helmExecutable.trim() === '') {
      throw new ConfigurationError('helm executable must not be blank', 'helmExecutable');
    }

    const builder = HelmExecutionBuilder.create(this._helmExecutable, this._workingDirectory, this.logger);
    return new DefaultHelmClient(builder, this.logger);
  }
}
