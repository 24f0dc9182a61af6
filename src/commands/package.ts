// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject} from 'tsyringe-neo';
import {BaseCommand, type CommandContext} from './base.js';
import {Flags} from './flags.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type PipelineLogger} from '../core/logging/pipeline-logger.js';
import {type ConfigurationLoader} from '../core/config/configuration-loader.js';
import {type ChartPipeline, type PackageResult, PipelineState} from '../core/chart-pipeline.js';
import {type HelmClientFactory} from '../integration/helm/helm-client-factory.js';
import {type ArtifactRegistryFactory} from '../core/artifact/artifact-registry-factory.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

interface PackageContext extends CommandContext {
  result: PackageResult;
}

/**
 * Packages every chart of the project and registers the placeholder artifact.
 */
export class PackageCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'package';

  private readonly artifactRegistryFactory: ArtifactRegistryFactory;

  public constructor(
    @inject(InjectTokens.PipelineLogger) logger?: PipelineLogger,
    @inject(InjectTokens.ConfigurationLoader) configurationLoader?: ConfigurationLoader,
    @inject(InjectTokens.ChartPipeline) pipeline?: ChartPipeline,
    @inject(InjectTokens.HelmClientFactory) helmClientFactory?: HelmClientFactory,
    @inject(InjectTokens.ArtifactRegistryFactory) artifactRegistryFactory?: ArtifactRegistryFactory,
  ) {
    super(logger, configurationLoader, pipeline, helmClientFactory);
    this.artifactRegistryFactory = patchInject(
      artifactRegistryFactory,
      InjectTokens.ArtifactRegistryFactory,
      this.constructor.name,
    );
  }

  public async package(argv: ArgvStruct): Promise<PackageResult> {
    const context_ = await this.runTasks<PackageContext>(PackageCommand.COMMAND_NAME, argv, [
      this.loadConfigurationTask(argv, Flags.PACKAGE_FLAGS),
      {
        title: 'Package charts',
        task: async (context_, task) => {
          const config = context_.config;
          context_.result = await this.pipeline.package(
            config,
            this.helmClient(config),
            this.artifactRegistryFactory.getRegistry(config.artifactRegistryFile),
            chartDirectory => {
              task.output = `Packaging ${chartDirectory}`;
            },
          );
          if (context_.result.state === PipelineState.SKIPPED) {
            task.skip('Skip package');
          } else {
            task.title = `Package charts: ${context_.result.charts.length} packaged`;
          }
        },
      },
    ]);

    const result = context_.result;
    if (result.state === PipelineState.DONE && result.charts.length > 0) {
      this.logger.showList('Packaged charts', [...result.charts]);
      if (result.placeholder?.error) {
        this.logger.showUser(chalk.yellow(result.placeholder.error.message));
      }
    }
    return result;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: PackageCommand.COMMAND_NAME,
      describe: 'Package every chart and register the placeholder artifact',
      builder: Flags.optionsOf(...Flags.PACKAGE_FLAGS),
      handler: async (argv: ArgvStruct) => {
        await this.package(argv);
      },
    };
  }
}
