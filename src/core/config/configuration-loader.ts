// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type PipelineLogger} from '../logging/pipeline-logger.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {TimestampPattern} from '../time/timestamp-pattern.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {
  CONFIGURATION_KEYS,
  type ConfigurationKey,
  type ConfigurationValues,
  configurationKeys,
  environmentVariableName,
  isConfigurationKey,
} from './configuration-keys.js';
import {LOG_LEVELS, type LogLevel, type PipelineConfiguration} from './pipeline-configuration.js';

export interface LoadOptions {
  /** YAML file with configuration keys at the top level; falls back to `HELM_PIPELINE_CONFIG` */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** directory a relative project directory is resolved against */
  workingDirectory?: string;
}

/**
 * Merges command flags, environment variables, the configuration file and defaults (in this order of precedence) into
 * a {@link PipelineConfiguration}.
 */
@injectable()
export class ConfigurationLoader {
  private readonly logger: PipelineLogger;

  public constructor(@inject(InjectTokens.PipelineLogger) logger?: PipelineLogger) {
    this.logger = patchInject(logger, InjectTokens.PipelineLogger, this.constructor.name);
  }

  /**
   * @param flags - values given on the command line; `undefined` means not given
   * @throws ConfigurationError if a value has the wrong type, a required value is empty, the timestamp format is
   * malformed or the configuration file cannot be read
   */
  public load(flags: ConfigurationValues, options: LoadOptions = {}): PipelineConfiguration {
    const env = options.env ?? process.env;
    const workingDirectory = options.workingDirectory ?? process.cwd();
    const configFile = options.configFile || env[`${constants.ENV_PREFIX}_CONFIG`];

    const sources: ConfigurationValues[] = [
      flags,
      this.readEnvironment(env),
      configFile ? this.readFile(PathEx.resolveAgainst(workingDirectory, configFile)) : {},
    ];
    const values = new ResolvedValues(sources);

    const projectDirectory = PathEx.resolveAgainst(workingDirectory, values.string('projectDirectory') || '.');
    const inProject = (target: string): string => PathEx.resolveAgainst(projectDirectory, target);

    const helmExecutable = values.string('helmExecutable') ?? constants.HELM;
    if (!helmExecutable.trim()) {
      throw new ConfigurationError('helmExecutable must not be empty', 'helmExecutable');
    }

    const placeholderArtifactPath = values.string('placeholderArtifactPath') ?? constants.DEFAULT_PLACEHOLDER_ARTIFACT_PATH;
    if (!placeholderArtifactPath.trim()) {
      throw new ConfigurationError('placeholderArtifactPath must not be empty', 'placeholderArtifactPath');
    }

    const logLevel = values.string('logLevel') ?? 'info';
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`, 'logLevel');
    }

    const chartDirectories = values.list('chartDirectory') ?? [];
    const templateOutputDirectory = values.string('templateOutputDirectory');

    const configuration: PipelineConfiguration = {
      skip: values.boolean('skip') ?? false,
      skipPackage: values.boolean('skipPackage') ?? false,
      skipLint: values.boolean('skipLint') ?? false,
      skipTemplate: values.boolean('skipTemplate') ?? false,
      skipDependencyUpdate: values.boolean('skipDependencyUpdate') ?? false,

      projectDirectory,
      chartDirectories: Object.freeze(
        chartDirectories.length > 0 ? chartDirectories : [constants.DEFAULT_CHART_DIRECTORY],
      ),
      excludes: Object.freeze(values.list('excludes') ?? []),
      outputDirectory: inProject(values.string('outputDirectory') || constants.DEFAULT_OUTPUT_DIRECTORY),
      helmExecutable,

      chartVersion: values.string('chartVersion') || undefined,
      appVersion: values.string('appVersion') || undefined,
      keyring: values.string('keyring') || undefined,
      key: values.string('key') || undefined,
      passphrase: values.string('passphrase') || undefined,

      timestampOnSnapshot: values.boolean('timestampOnSnapshot') ?? false,
      timestampFormat: TimestampPattern.compile(values.string('timestampFormat') ?? constants.DEFAULT_TIMESTAMP_FORMAT),

      placeholderArtifactPath: inProject(placeholderArtifactPath),
      artifactRegistryFile: inProject(values.string('artifactRegistryFile') || constants.DEFAULT_ARTIFACT_REGISTRY_FILE),
      module: Object.freeze({
        name: values.string('moduleName') || path.basename(projectDirectory),
        version: values.string('moduleVersion') || undefined,
      }),

      lintStrict: values.boolean('lintStrict') ?? false,
      valuesFiles: Object.freeze(values.list('valuesFiles') ?? []),
      templateOutputDirectory: templateOutputDirectory ? inProject(templateOutputDirectory) : undefined,

      logLevel,
      dev: values.boolean('dev') ?? false,
    };

    this.logger.debug(`Configuration loaded for ${configuration.projectDirectory}`);
    return Object.freeze(configuration);
  }

  private readEnvironment(env: NodeJS.ProcessEnv): ConfigurationValues {
    const values: ConfigurationValues = {};
    for (const key of configurationKeys()) {
      const value = env[environmentVariableName(constants.ENV_PREFIX, key)];
      if (value !== undefined) {
        values[key] = value;
      }
    }
    return values;
  }

  private readFile(file: string): ConfigurationValues {
    let parsed: unknown;
    try {
      parsed = yaml.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Unable to read configuration file ${file}`, 'config', error);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigurationError(`Configuration file ${file} must contain a mapping`, 'config');
    }

    const values: ConfigurationValues = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (isConfigurationKey(key)) {
        values[key] = value;
      } else {
        this.logger.warn(`Ignoring unknown key '${key}' in configuration file ${file}`);
      }
    }
    return values;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Looks every key up in the sources in order and converts the first value found to the key's kind.
 */
class ResolvedValues {
  public constructor(private readonly sources: readonly ConfigurationValues[]) {}

  public boolean(key: ConfigurationKey): boolean | undefined {
    const value = this.lookup(key);
    if (value === undefined || typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized === 'true') {
        return true;
      }
      if (normalized === 'false' || normalized === '') {
        return false;
      }
    }
    throw this.invalid(key, value);
  }

  public string(key: ConfigurationKey): string | undefined {
    const value = this.lookup(key);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
    throw this.invalid(key, value);
  }

  /** accepts a list or a comma separated string; blank entries are dropped */
  public list(key: ConfigurationKey): string[] | undefined {
    const value = this.lookup(key);
    if (value === undefined) {
      return undefined;
    }

    const entries: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [value];
    const result: string[] = [];
    for (const entry of entries) {
      if (typeof entry !== 'string' && typeof entry !== 'number') {
        throw this.invalid(key, value);
      }
      const text = String(entry).trim();
      if (text) {
        result.push(text);
      }
    }
    return result;
  }

  private lookup(key: ConfigurationKey): unknown {
    for (const source of this.sources) {
      const value = source[key];
      if (value !== undefined && value !== null) {
        return value;
      }
    }
    return undefined;
  }

  private invalid(key: ConfigurationKey, value: unknown): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for ${key}: expected ${CONFIGURATION_KEYS[key]}, got ${JSON.stringify(value)}`,
      key,
    );
  }
}
