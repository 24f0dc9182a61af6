// SPDX-License-Identifier: Apache-2.0

export type ValueKind = 'boolean' | 'string' | 'list';

/**
 * Every configuration key with the kind of value it takes. Keys are shared by the command flags (kebab-cased), the
 * environment (`HELM_PIPELINE_` followed by the upper snake-cased key) and the YAML configuration file.
 */
export const CONFIGURATION_KEYS = {
  skip: 'boolean',
  skipPackage: 'boolean',
  skipLint: 'boolean',
  skipTemplate: 'boolean',
  skipDependencyUpdate: 'boolean',
  projectDirectory: 'string',
  chartDirectory: 'list',
  excludes: 'list',
  outputDirectory: 'string',
  helmExecutable: 'string',
  chartVersion: 'string',
  appVersion: 'string',
  keyring: 'string',
  key: 'string',
  passphrase: 'string',
  timestampOnSnapshot: 'boolean',
  timestampFormat: 'string',
  placeholderArtifactPath: 'string',
  artifactRegistryFile: 'string',
  moduleName: 'string',
  moduleVersion: 'string',
  lintStrict: 'boolean',
  valuesFiles: 'list',
  templateOutputDirectory: 'string',
  logLevel: 'string',
  dev: 'boolean',
} as const satisfies Record<string, ValueKind>;

export type ConfigurationKey = keyof typeof CONFIGURATION_KEYS;

/**
 * Raw, unvalidated values for some of the keys, as they come from one configuration source.
 */
export type ConfigurationValues = Partial<Record<ConfigurationKey, unknown>>;

export function isConfigurationKey(key: string): key is ConfigurationKey {
  return Object.prototype.hasOwnProperty.call(CONFIGURATION_KEYS, key);
}

export function configurationKeys(): ConfigurationKey[] {
  return Object.keys(CONFIGURATION_KEYS).filter(isConfigurationKey);
}

/**
 * `skipDependencyUpdate` is read from `HELM_PIPELINE_SKIP_DEPENDENCY_UPDATE`
 */
export function environmentVariableName(prefix: string, key: ConfigurationKey): string {
  return `${prefix}_${key.replaceAll(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase()}`;
}
