// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type PipelineLogger} from '../logging/pipeline-logger.js';
import {PipelineWinstonLogger} from '../logging/pipeline-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {SYSTEM_CLOCK} from '../time/clock.js';
import {ConfigurationLoader} from '../config/configuration-loader.js';
import {ChartVersionResolver} from '../chart-version-resolver.js';
import {ChartDirectoryLocator} from '../chart-directory-locator.js';
import {PlaceholderArtifactWriter} from '../artifact/placeholder-artifact-writer.js';
import {FileArtifactRegistryFactory} from '../artifact/file-artifact-registry-factory.js';
import {ChartPipeline} from '../chart-pipeline.js';
import {DefaultHelmClientFactory} from '../../integration/helm/impl/default-helm-client-factory.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use until the configuration is loaded
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where the log file is written, defaults to constants.PIPELINE_LOGS_DIR
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logLevel: string = 'info',
    developmentMode: boolean = false,
    logsDirectory: string = constants.PIPELINE_LOGS_DIR,
    testLogger?: PipelineLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<PipelineLogger>(InjectTokens.PipelineLogger).debug('Container already initialized');
      return;
    }

    // PipelineLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogsDirectory, {useValue: logsDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.PipelineLogger, testLogger);
      container.resolve<PipelineLogger>(InjectTokens.PipelineLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.PipelineLogger,
        {useClass: PipelineWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<PipelineLogger>(InjectTokens.PipelineLogger).debug('Using default logger');
    }

    container.register(InjectTokens.Clock, {useValue: SYSTEM_CLOCK});
    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ConfigurationLoader,
      {useClass: ConfigurationLoader},
      {lifecycle: Lifecycle.Singleton},
    );

    // Chart pipeline
    container.register(
      InjectTokens.ChartVersionResolver,
      {useClass: ChartVersionResolver},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ChartDirectoryLocator,
      {useClass: ChartDirectoryLocator},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.PlaceholderArtifactWriter,
      {useClass: PlaceholderArtifactWriter},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ArtifactRegistryFactory,
      {useClass: FileArtifactRegistryFactory},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.HelmClientFactory,
      {useClass: DefaultHelmClientFactory},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ChartPipeline, {useClass: ChartPipeline}, {lifecycle: Lifecycle.Singleton});

    container.resolve<PipelineLogger>(InjectTokens.PipelineLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where the log file is written
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logLevel?: string, developmentMode?: boolean, logsDirectory?: string, testLogger?: PipelineLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<PipelineLogger>(InjectTokens.PipelineLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, logsDirectory, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
