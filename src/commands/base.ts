// SPDX-License-Identifier: Apache-2.0

import {Listr, type ListrTask} from 'listr2';
import {inject} from 'tsyringe-neo';
import * as constants from '../core/constants.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type PipelineLogger} from '../core/logging/pipeline-logger.js';
import {type ConfigurationLoader} from '../core/config/configuration-loader.js';
import {type PipelineConfiguration} from '../core/config/pipeline-configuration.js';
import {type ChartPipeline} from '../core/chart-pipeline.js';
import {type HelmClientFactory} from '../integration/helm/helm-client-factory.js';
import {type HelmClient} from '../integration/helm/helm-client.js';
import {PipelineError} from '../core/errors/pipeline-error.js';
import {type CommandFlag} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {Flags} from './flags.js';

export interface CommandContext {
  config: PipelineConfiguration;
}

export abstract class BaseCommand {
  protected readonly logger: PipelineLogger;
  protected readonly configurationLoader: ConfigurationLoader;
  protected readonly pipeline: ChartPipeline;
  protected readonly helmClientFactory: HelmClientFactory;

  public constructor(
    @inject(InjectTokens.PipelineLogger) logger?: PipelineLogger,
    @inject(InjectTokens.ConfigurationLoader) configurationLoader?: ConfigurationLoader,
    @inject(InjectTokens.ChartPipeline) pipeline?: ChartPipeline,
    @inject(InjectTokens.HelmClientFactory) helmClientFactory?: HelmClientFactory,
  ) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
    this.configurationLoader = patchInject(
      configurationLoader,
      InjectTokens.ConfigurationLoader,
      this.constructor.name,
    );
    this.pipeline = patchInject(pipeline, InjectTokens.ChartPipeline, this.constructor.name);
    this.helmClientFactory = patchInject(helmClientFactory, InjectTokens.HelmClientFactory, this.constructor.name);
  }

  /**
   * Loads the configuration from the command line (restricted to `commandFlags`), the environment and the
   * configuration file, and applies its logging settings.
   */
  protected loadConfiguration(argv: ArgvStruct, commandFlags: CommandFlag[]): PipelineConfiguration {
    const config = this.configurationLoader.load(Flags.readValues(argv, ...commandFlags), {
      configFile: Flags.stringValue(argv, Flags.configFile),
    });

    this.logger.setLogLevel(config.logLevel);
    this.logger.setDevMode(config.dev);
    if (config.dev) {
      this.logger.showList('Flags', Flags.displayValues(argv, ...commandFlags));
    }
    return config;
  }

  protected helmClient(config: PipelineConfiguration): HelmClient {
    return this.helmClientFactory.getClient(config.helmExecutable, config.projectDirectory);
  }

  /**
   * The task every command starts with
   */
  protected loadConfigurationTask<T extends CommandContext>(
    argv: ArgvStruct,
    commandFlags: CommandFlag[],
  ): ListrTask<T> {
    return {
      title: 'Load configuration',
      task: context_ => {
        context_.config = this.loadConfiguration(argv, commandFlags);
      },
    };
  }

  /**
   * Runs the tasks one after the other; the renderer stays silent in quiet mode.
   * @throws PipelineError naming the command and the failure that stopped it
   */
  protected async runTasks<T extends CommandContext>(
    commandName: string,
    argv: ArgvStruct,
    tasks: ListrTask<T>[],
  ): Promise<T> {
    const quiet = Flags.booleanValue(argv, Flags.quiet);
    const listr = new Listr<T>(tasks, {
      concurrent: false,
      rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      silentRendererCondition: () => quiet,
    });

    try {
      return await listr.run();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PipelineError(`Error running ${commandName}: ${reason}`, error);
    }
  }
}
