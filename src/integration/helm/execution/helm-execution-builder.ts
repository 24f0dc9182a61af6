// SPDX-License-Identifier: Apache-2.0

import {HelmExecution} from './helm-execution.js';
import {type PipelineLogger} from '../../../core/logging/pipeline-logger.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';
import * as constants from '../../../core/constants.js';

interface HelmExecutionState {
  readonly helmExecutable: string;
  readonly subcommands: readonly string[];
  readonly positionals: readonly string[];
  readonly options: readonly (readonly string[])[];
  readonly workingDirectory: string;
  readonly standardInput?: string;
}

/**
 * An immutable builder for a helm command execution.
 *
 * Every method returns a new builder, so a partially configured builder can be shared and extended per chart without
 * one chart's flags leaking into another's. The argument vector is only rendered when {@link build} is called, always
 * in the same order: subcommands, positionals, then options in the order they were added.
 */
export class HelmExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  private constructor(
    private readonly state: HelmExecutionState,
    private readonly logger?: PipelineLogger,
  ) {}

  /**
   * Creates a new builder.
   * @param helmExecutable the path to (or the name on the PATH of) the helm executable
   * @param workingDirectory the working directory of the process
   * @param logger used to log the rendered command line at debug level
   */
  public static create(helmExecutable: string, workingDirectory: string, logger?: PipelineLogger): HelmExecutionBuilder {
    if (!helmExecutable) {
      throw new MissingArgumentError('helmExecutable must not be null');
    }
    if (!workingDirectory) {
      throw new MissingArgumentError('workingDirectory must not be null');
    }
    return new HelmExecutionBuilder(
      {
        helmExecutable,
        subcommands: [],
        positionals: [],
        options: [],
        workingDirectory,
      },
      logger,
    );
  }

  private with(changes: Partial<HelmExecutionState>): HelmExecutionBuilder {
    return new HelmExecutionBuilder({...this.state, ...changes}, this.logger);
  }

  /**
   * Adds the list of subcommands to the helm execution.
   * @param commands the list of subcommands to be added
   */
  public subcommands(...commands: string[]): HelmExecutionBuilder {
    if (commands.some(command => !command)) {
      throw new IllegalArgumentError('commands must not be blank', commands);
    }
    return this.with({subcommands: [...this.state.subcommands, ...commands]});
  }

  /**
   * Adds a positional argument to the helm execution.
   * @param value the value of the positional argument
   */
  public positional(value: string): HelmExecutionBuilder {
    if (!value) {
      throw new MissingArgumentError(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    return this.with({positionals: [...this.state.positionals, value]});
  }

  /**
   * Adds `--name value` to the helm execution. An absent or empty value leaves the builder unchanged, so optional
   * settings can be chained without checks and never render as a dangling flag.
   * @param name the name of the argument, without the leading dashes
   * @param value the value of the argument
   */
  public argument(name: string, value: string | null | undefined): HelmExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (value === null || value === undefined || value === '') {
      return this;
    }
    return this.with({options: [...this.state.options, [`--${name}`, value]]});
  }

  /**
   * Adds `--name value` once for every value.
   * @param name the name of the option
   * @param values the list of values for the option
   */
  public optionsWithMultipleValues(name: string, values: readonly string[]): HelmExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    let builder: HelmExecutionBuilder = this;
    for (const value of values) {
      builder = builder.argument(name, value);
    }
    return builder;
  }

  /**
   * Adds a flag without value, e.g. `--sign`.
   * @param flag the flag to be added, with or without the leading dashes
   */
  public flag(flag: string): HelmExecutionBuilder {
    if (!flag) {
      throw new MissingArgumentError('flag must not be null');
    }
    return this.with({options: [...this.state.options, [flag.startsWith('-') ? flag : `--${flag}`]]});
  }

  /**
   * Feeds `content` to the process on standard input, then closes it. Pair it with an option whose value is
   * {@link constants.STDIN_SENTINEL} so that the content, typically a secret, never shows up in the argument list.
   */
  public standardInput(content: string): HelmExecutionBuilder {
    if (!content) {
      throw new MissingArgumentError('content must not be null');
    }
    return this.with({standardInput: content});
  }

  /**
   * Option name and value that tell helm to read the value of `name` from standard input.
   */
  public argumentFromStandardInput(name: string, content: string): HelmExecutionBuilder {
    return this.argument(name, constants.STDIN_SENTINEL).standardInput(content);
  }

  /**
   * The argument vector passed to the helm executable, without the executable itself.
   */
  public arguments(): string[] {
    return [...this.state.subcommands, ...this.state.positionals, ...this.state.options.flat()];
  }

  /**
   * Builds the HelmExecution instance.
   */
  public build(): HelmExecution {
    const command = [this.state.helmExecutable, ...this.arguments()];

    this.logger?.debug(
      `Helm command: helm ${command.slice(1).join(' ')}` +
        (this.state.standardInput === undefined ? '' : ' (with standard input)'),
    );

    return new HelmExecution(command, this.state.workingDirectory, this.state.standardInput);
  }
}
