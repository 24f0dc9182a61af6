// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type PipelineLogger} from './logging/pipeline-logger.js';
import {type Clock} from './time/clock.js';
import {type ChartVersionResolver} from './chart-version-resolver.js';
import {type ChartDirectoryLocator} from './chart-directory-locator.js';
import {type PlaceholderArtifactWriter, type PlaceholderWriteResult} from './artifact/placeholder-artifact-writer.js';
import {type ArtifactRegistry} from './artifact/artifact-registry.js';
import {type PipelineConfiguration} from './config/pipeline-configuration.js';
import {type HelmClient} from '../integration/helm/helm-client.js';
import {PackageChartOptionsBuilder} from '../integration/helm/model/package/package-chart-options-builder.js';
import {LintChartOptions} from '../integration/helm/model/lint/lint-chart-options.js';
import {TemplateChartOptions} from '../integration/helm/model/template/template-chart-options.js';
import {ChartMetadata} from '../integration/helm/model/chart/chart-metadata.js';
import {PathEx} from '../business/utils/path-ex.js';

export enum PipelineState {
  SKIPPED = 'SKIPPED',
  DONE = 'DONE',
}

export interface GoalResult {
  readonly state: PipelineState;
  /** chart directories processed, in order */
  readonly charts: readonly string[];
}

export interface PackageResult extends GoalResult {
  /** the configured version after timestamping, `null` when every chart keeps or derives its own */
  readonly version: string | null;
  /** absent when nothing was packaged */
  readonly placeholder?: PlaceholderWriteResult;
}

/**
 * Called right before helm is run for a chart directory.
 */
export type ChartListener = (chartDirectory: string) => void;

/**
 * Runs a helm goal over every discovered chart directory.
 *
 * Charts are processed one after the other. The first chart helm fails on aborts the run: its error propagates
 * unchanged and the remaining charts are never touched.
 */
@injectable()
export class ChartPipeline {
  private readonly versionResolver: ChartVersionResolver;
  private readonly locator: ChartDirectoryLocator;
  private readonly placeholderWriter: PlaceholderArtifactWriter;
  private readonly clock: Clock;
  private readonly logger: PipelineLogger;

  public constructor(
    @inject(InjectTokens.ChartVersionResolver) versionResolver?: ChartVersionResolver,
    @inject(InjectTokens.ChartDirectoryLocator) locator?: ChartDirectoryLocator,
    @inject(InjectTokens.PlaceholderArtifactWriter) placeholderWriter?: PlaceholderArtifactWriter,
    @inject(InjectTokens.Clock) clock?: Clock,
    @inject(InjectTokens.PipelineLogger) logger?: PipelineLogger,
  ) {
    this.versionResolver = patchInject(versionResolver, InjectTokens.ChartVersionResolver, this.constructor.name);
    this.locator = patchInject(locator, InjectTokens.ChartDirectoryLocator, this.constructor.name);
    this.placeholderWriter = patchInject(placeholderWriter, InjectTokens.PlaceholderArtifactWriter, this.constructor.name);
    this.clock = patchInject(clock, InjectTokens.Clock, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  /**
   * Packages every chart into the output directory. The placeholder artifact is written and registered once, right after
   * the first chart helm packaged; a chart that fails later leaves it in place.
   */
  public async package(
    config: PipelineConfiguration,
    helm: HelmClient,
    registry: ArtifactRegistry,
    listener?: ChartListener,
  ): Promise<PackageResult> {
    if (config.skip || config.skipPackage) {
      this.logger.info('Skip package');
      return {state: PipelineState.SKIPPED, charts: [], version: null};
    }

    const now = this.clock.now();
    const version = config.chartVersion
      ? this.versionResolver.resolve(config.chartVersion, undefined, config.timestampOnSnapshot, config.timestampFormat, now)
      : null;
    if (version) {
      this.logger.info(`Packaging charts with version ${version}`);
    }

    const placeholders: PlaceholderWriteResult[] = [];
    const charts = await this.forEachChart(config, listener, async chartDirectory => {
      const options = PackageChartOptionsBuilder.builder()
        .destination(config.outputDirectory)
        .version(version ?? this.chartOwnVersion(config, chartDirectory, now))
        .appVersion(config.appVersion)
        .keyring(config.keyring)
        .key(config.key)
        .passphrase(config.passphrase)
        .build();
      this.logger.debug(`Packaging ${chartDirectory} with ${options}`);
      await helm.packageChart(chartDirectory, options);
      if (placeholders.length === 0) {
        const {placeholderArtifactPath, module} = config;
        placeholders.push(this.placeholderWriter.writePlaceholder(placeholderArtifactPath, module, registry));
      }
    });

    const [placeholder] = placeholders;
    if (!placeholder) {
      return {state: PipelineState.DONE, charts, version};
    }
    return {state: PipelineState.DONE, charts, version, placeholder};
  }

  public async lint(config: PipelineConfiguration, helm: HelmClient, listener?: ChartListener): Promise<GoalResult> {
    if (config.skip || config.skipLint) {
      this.logger.info('Skip lint');
      return {state: PipelineState.SKIPPED, charts: []};
    }

    const options = new LintChartOptions(config.lintStrict, config.valuesFiles);
    const charts = await this.forEachChart(config, listener, chartDirectory => helm.lintChart(chartDirectory, options));
    return {state: PipelineState.DONE, charts};
  }

  public async template(config: PipelineConfiguration, helm: HelmClient, listener?: ChartListener): Promise<GoalResult> {
    if (config.skip || config.skipTemplate) {
      this.logger.info('Skip template');
      return {state: PipelineState.SKIPPED, charts: []};
    }

    const options = new TemplateChartOptions(config.valuesFiles, config.templateOutputDirectory ?? null);
    const charts = await this.forEachChart(config, listener, async chartDirectory => {
      const manifests = await helm.templateChart(chartDirectory, options);
      if (manifests) {
        this.logger.debug(`Rendered ${chartDirectory}:\n${manifests}`);
      }
    });
    return {state: PipelineState.DONE, charts};
  }

  public async updateDependencies(
    config: PipelineConfiguration,
    helm: HelmClient,
    listener?: ChartListener,
  ): Promise<GoalResult> {
    if (config.skip || config.skipDependencyUpdate) {
      this.logger.info('Skip dependency update');
      return {state: PipelineState.SKIPPED, charts: []};
    }

    const charts = await this.forEachChart(config, listener, chartDirectory => helm.dependencyUpdate(chartDirectory));
    return {state: PipelineState.DONE, charts};
  }

  private async forEachChart(
    config: PipelineConfiguration,
    listener: ChartListener | undefined,
    action: (chartDirectory: string) => Promise<void>,
  ): Promise<string[]> {
    const processed: string[] = [];
    for (const chartDirectory of this.locator.locate(config.chartDirectories, config.excludes, config.projectDirectory)) {
      listener?.(chartDirectory);
      await action(chartDirectory);
      processed.push(chartDirectory);
    }

    if (processed.length === 0) {
      this.logger.warn(`No charts found in ${config.chartDirectories.join(', ')}`);
    }
    return processed;
  }

  /**
   * Without a configured version the chart keeps its own, unless it is a snapshot that gets timestamped.
   */
  private chartOwnVersion(config: PipelineConfiguration, chartDirectory: string, now: Date): string | null {
    if (!config.timestampOnSnapshot) {
      return null;
    }
    const metadata = ChartMetadata.load(PathEx.resolveAgainst(config.projectDirectory, chartDirectory));
    return this.versionResolver.resolve(undefined, metadata.version, true, config.timestampFormat, now);
  }
}
