// SPDX-License-Identifier: Apache-2.0

import {type Options} from 'yargs';
import {type CommandFlag} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type ConfigurationValues, isConfigurationKey} from '../core/config/configuration-keys.js';

export class Flags {
  /**
   * Yargs options for the given flags. Flags carry no defaults: a value left out on the command line may still come
   * from the environment or the configuration file.
   */
  public static optionsOf(...commandFlags: CommandFlag[]): Record<string, Options> {
    const options: Record<string, Options> = {};
    for (const flag of commandFlags) {
      options[flag.name] = {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
      };
    }
    return options;
  }

  /**
   * Collects the configuration values given on the command line
   */
  public static readValues(argv: ArgvStruct, ...commandFlags: CommandFlag[]): ConfigurationValues {
    const values: ConfigurationValues = {};
    for (const flag of commandFlags) {
      if (isConfigurationKey(flag.constName) && argv[flag.name] !== undefined) {
        values[flag.constName] = argv[flag.name];
      }
    }
    return values;
  }

  /**
   * The value of a string flag, `undefined` when it was not given
   */
  public static stringValue(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value = argv[flag.name];
    return typeof value === 'string' ? value : undefined;
  }

  public static booleanValue(argv: ArgvStruct, flag: CommandFlag): boolean {
    return argv[flag.name] === true;
  }

  /**
   * `name: value` lines for the flags given on the command line, with masked values hidden
   */
  public static displayValues(argv: ArgvStruct, ...commandFlags: CommandFlag[]): string[] {
    return commandFlags
      .filter(flag => argv[flag.name] !== undefined)
      .map(flag => `${flag.name}: ${flag.definition.dataMask ?? String(argv[flag.name])}`);
  }

  public static readonly devMode: CommandFlag = {
    constName: 'dev',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      type: 'boolean',
    },
  };

  public static readonly quiet: CommandFlag = {
    constName: 'quiet',
    name: 'quiet-mode',
    definition: {
      describe: 'Quiet mode, do not render task progress',
      alias: 'q',
      type: 'boolean',
    },
  };

  public static readonly logLevel: CommandFlag = {
    constName: 'logLevel',
    name: 'log-level',
    definition: {
      describe: 'Level of the log file (error, warn, info, http, verbose, debug, silly)',
      type: 'string',
    },
  };

  public static readonly configFile: CommandFlag = {
    constName: 'config',
    name: 'config',
    definition: {
      describe: 'YAML file with configuration values, overridden by environment variables and flags',
      alias: 'c',
      type: 'string',
    },
  };

  public static readonly skip: CommandFlag = {
    constName: 'skip',
    name: 'skip',
    definition: {
      describe: 'Skip every goal',
      type: 'boolean',
    },
  };

  public static readonly skipPackage: CommandFlag = {
    constName: 'skipPackage',
    name: 'skip-package',
    definition: {
      describe: 'Skip packaging',
      type: 'boolean',
    },
  };

  public static readonly skipLint: CommandFlag = {
    constName: 'skipLint',
    name: 'skip-lint',
    definition: {
      describe: 'Skip linting',
      type: 'boolean',
    },
  };

  public static readonly skipTemplate: CommandFlag = {
    constName: 'skipTemplate',
    name: 'skip-template',
    definition: {
      describe: 'Skip template rendering',
      type: 'boolean',
    },
  };

  public static readonly skipDependencyUpdate: CommandFlag = {
    constName: 'skipDependencyUpdate',
    name: 'skip-dependency-update',
    definition: {
      describe: 'Skip the dependency update',
      type: 'boolean',
    },
  };

  public static readonly projectDirectory: CommandFlag = {
    constName: 'projectDirectory',
    name: 'project-directory',
    definition: {
      describe: 'Project directory, all relative paths are read from here (default: current directory)',
      alias: 'p',
      type: 'string',
    },
  };

  public static readonly chartDirectory: CommandFlag = {
    constName: 'chartDirectory',
    name: 'chart-directory',
    definition: {
      describe: 'Directories searched for charts (default: src/main/helm)',
      alias: 'd',
      type: 'array',
    },
  };

  public static readonly excludes: CommandFlag = {
    constName: 'excludes',
    name: 'excludes',
    definition: {
      describe: 'Glob patterns of directories to leave out, relative to the project directory',
      type: 'array',
    },
  };

  public static readonly outputDirectory: CommandFlag = {
    constName: 'outputDirectory',
    name: 'output-directory',
    definition: {
      describe: 'Directory the chart archives are written to (default: target/helm/repo)',
      alias: 'o',
      type: 'string',
    },
  };

  public static readonly helmExecutable: CommandFlag = {
    constName: 'helmExecutable',
    name: 'helm-executable',
    definition: {
      describe: 'Helm executable, looked up on the PATH unless it is a path (default: helm)',
      type: 'string',
    },
  };

  public static readonly chartVersion: CommandFlag = {
    constName: 'chartVersion',
    name: 'chart-version',
    definition: {
      describe: 'Version set on every chart, instead of the one in Chart.yaml',
      type: 'string',
    },
  };

  public static readonly appVersion: CommandFlag = {
    constName: 'appVersion',
    name: 'app-version',
    definition: {
      describe: 'App version set on every chart',
      type: 'string',
    },
  };

  public static readonly keyring: CommandFlag = {
    constName: 'keyring',
    name: 'keyring',
    definition: {
      describe: 'Keyring holding the signing key; charts are signed when keyring and key are set',
      type: 'string',
    },
  };

  public static readonly key: CommandFlag = {
    constName: 'key',
    name: 'key',
    definition: {
      describe: 'Name of the signing key',
      type: 'string',
    },
  };

  public static readonly passphrase: CommandFlag = {
    constName: 'passphrase',
    name: 'passphrase',
    definition: {
      describe: 'Passphrase of the signing key, handed to helm through standard input',
      type: 'string',
      dataMask: '********',
    },
  };

  public static readonly timestampOnSnapshot: CommandFlag = {
    constName: 'timestampOnSnapshot',
    name: 'timestamp-on-snapshot',
    definition: {
      describe: 'Replace the SNAPSHOT qualifier of a -SNAPSHOT version with a timestamp',
      type: 'boolean',
    },
  };

  public static readonly timestampFormat: CommandFlag = {
    constName: 'timestampFormat',
    name: 'timestamp-format',
    definition: {
      describe: 'Pattern of the snapshot timestamp (default: yyyyMMddHHmmss)',
      type: 'string',
    },
  };

  public static readonly placeholderArtifactPath: CommandFlag = {
    constName: 'placeholderArtifactPath',
    name: 'placeholder-artifact-path',
    definition: {
      describe: 'Placeholder artifact file registered for the module (default: target/helm.placeholder.txt)',
      type: 'string',
    },
  };

  public static readonly artifactRegistryFile: CommandFlag = {
    constName: 'artifactRegistryFile',
    name: 'artifact-registry-file',
    definition: {
      describe: 'File the artifact registration is written to (default: target/helm.artifact.json)',
      type: 'string',
    },
  };

  public static readonly moduleName: CommandFlag = {
    constName: 'moduleName',
    name: 'module-name',
    definition: {
      describe: 'Name of the module the placeholder artifact is registered for (default: project directory name)',
      type: 'string',
    },
  };

  public static readonly moduleVersion: CommandFlag = {
    constName: 'moduleVersion',
    name: 'module-version',
    definition: {
      describe: 'Version of the module the placeholder artifact is registered for',
      type: 'string',
    },
  };

  public static readonly lintStrict: CommandFlag = {
    constName: 'lintStrict',
    name: 'lint-strict',
    definition: {
      describe: 'Fail on lint warnings',
      type: 'boolean',
    },
  };

  public static readonly valuesFiles: CommandFlag = {
    constName: 'valuesFiles',
    name: 'values-files',
    definition: {
      describe: 'Values files used to lint and render the charts',
      alias: 'f',
      type: 'array',
    },
  };

  public static readonly templateOutputDirectory: CommandFlag = {
    constName: 'templateOutputDirectory',
    name: 'template-output-directory',
    definition: {
      describe: 'Directory the rendered manifests are written to instead of the log',
      type: 'string',
    },
  };

  /** flags every command takes */
  public static readonly COMMON_FLAGS: CommandFlag[] = [
    Flags.configFile,
    Flags.devMode,
    Flags.quiet,
    Flags.logLevel,
    Flags.skip,
    Flags.projectDirectory,
    Flags.chartDirectory,
    Flags.excludes,
    Flags.helmExecutable,
  ];

  public static readonly PACKAGE_FLAGS: CommandFlag[] = [
    ...Flags.COMMON_FLAGS,
    Flags.skipPackage,
    Flags.outputDirectory,
    Flags.chartVersion,
    Flags.appVersion,
    Flags.keyring,
    Flags.key,
    Flags.passphrase,
    Flags.timestampOnSnapshot,
    Flags.timestampFormat,
    Flags.placeholderArtifactPath,
    Flags.artifactRegistryFile,
    Flags.moduleName,
    Flags.moduleVersion,
  ];

  public static readonly LINT_FLAGS: CommandFlag[] = [
    ...Flags.COMMON_FLAGS,
    Flags.skipLint,
    Flags.lintStrict,
    Flags.valuesFiles,
  ];

  public static readonly TEMPLATE_FLAGS: CommandFlag[] = [
    ...Flags.COMMON_FLAGS,
    Flags.skipTemplate,
    Flags.valuesFiles,
    Flags.templateOutputDirectory,
  ];

  public static readonly DEPENDENCY_UPDATE_FLAGS: CommandFlag[] = [...Flags.COMMON_FLAGS, Flags.skipDependencyUpdate];
}
