// SPDX-License-Identifier: Apache-2.0

import {type TimestampPattern} from '../time/timestamp-pattern.js';
import {type ModuleIdentity} from '../artifact/module-identity.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * The validated settings of one invocation. Produced by the {@link ConfigurationLoader} and never modified afterwards.
 *
 * `projectDirectory` is absolute; chart directories keep the form they were configured in and are read relative to
 * the project directory, which is also the working directory of every helm process. Files written by the pipeline
 * itself are absolute.
 */
export interface PipelineConfiguration {
  readonly skip: boolean;
  readonly skipPackage: boolean;
  readonly skipLint: boolean;
  readonly skipTemplate: boolean;
  readonly skipDependencyUpdate: boolean;

  readonly projectDirectory: string;
  readonly chartDirectories: readonly string[];
  readonly excludes: readonly string[];
  readonly outputDirectory: string;
  readonly helmExecutable: string;

  readonly chartVersion?: string;
  readonly appVersion?: string;
  readonly keyring?: string;
  readonly key?: string;
  readonly passphrase?: string;

  readonly timestampOnSnapshot: boolean;
  readonly timestampFormat: TimestampPattern;

  readonly placeholderArtifactPath: string;
  readonly artifactRegistryFile: string;
  readonly module: ModuleIdentity;

  readonly lintStrict: boolean;
  readonly valuesFiles: readonly string[];
  readonly templateOutputDirectory?: string;

  readonly logLevel: LogLevel;
  readonly dev: boolean;
}
