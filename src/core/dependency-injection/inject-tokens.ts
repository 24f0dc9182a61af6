// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  PipelineLogger: Symbol.for('PipelineLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Clock: Symbol.for('Clock'),
  ConfigurationLoader: Symbol.for('ConfigurationLoader'),
  ChartVersionResolver: Symbol.for('ChartVersionResolver'),
  ChartDirectoryLocator: Symbol.for('ChartDirectoryLocator'),
  PlaceholderArtifactWriter: Symbol.for('PlaceholderArtifactWriter'),
  ArtifactRegistryFactory: Symbol.for('ArtifactRegistryFactory'),
  HelmClientFactory: Symbol.for('HelmClientFactory'),
  ChartPipeline: Symbol.for('ChartPipeline'),
};
