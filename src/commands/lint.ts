// SPDX-License-Identifier: Apache-2.0

import {BaseCommand, type CommandContext} from './base.js';
import {Flags} from './flags.js';
import {type GoalResult, PipelineState} from '../core/chart-pipeline.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

interface LintContext extends CommandContext {
  result: GoalResult;
}

export class LintCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'lint';

  public async lint(argv: ArgvStruct): Promise<GoalResult> {
    const context_ = await this.runTasks<LintContext>(LintCommand.COMMAND_NAME, argv, [
      this.loadConfigurationTask(argv, Flags.LINT_FLAGS),
      {
        title: 'Lint charts',
        task: async (context_, task) => {
          const config = context_.config;
          context_.result = await this.pipeline.lint(config, this.helmClient(config), chartDirectory => {
            task.output = `Linting ${chartDirectory}`;
          });
          if (context_.result.state === PipelineState.SKIPPED) {
            task.skip('Skip lint');
          }
        },
      },
    ]);
    return context_.result;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: LintCommand.COMMAND_NAME,
      describe: 'Run helm lint on every chart',
      builder: Flags.optionsOf(...Flags.LINT_FLAGS),
      handler: async (argv: ArgvStruct) => {
        await this.lint(argv);
      },
    };
  }
}
