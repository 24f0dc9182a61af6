// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type HelmClientFactory} from '../helm-client-factory.js';
import {type HelmClient} from '../helm-client.js';
import {DefaultHelmClientBuilder} from './default-helm-client-builder.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type PipelineLogger} from '../../../core/logging/pipeline-logger.js';

@injectable()
export class DefaultHelmClientFactory implements HelmClientFactory {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  public getClient(helmExecutable: string, workingDirectory: string): HelmClient {
    return new DefaultHelmClientBuilder(this.logger)
      .helmExecutable(helmExecutable)
      .workingDirectory(workingDirectory)
      .build();
  }
}
