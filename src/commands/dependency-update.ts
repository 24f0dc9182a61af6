// SPDX-License-Identifier: Apache-2.0

import {BaseCommand, type CommandContext} from './base.js';
import {Flags} from './flags.js';
import {type GoalResult, PipelineState} from '../core/chart-pipeline.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

interface DependencyUpdateContext extends CommandContext {
  result: GoalResult;
}

export class DependencyUpdateCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'dependency-update';

  public async updateDependencies(argv: ArgvStruct): Promise<GoalResult> {
    const context_ = await this.runTasks<DependencyUpdateContext>(DependencyUpdateCommand.COMMAND_NAME, argv, [
      this.loadConfigurationTask(argv, Flags.DEPENDENCY_UPDATE_FLAGS),
      {
        title: 'Update chart dependencies',
        task: async (context_, task) => {
          const config = context_.config;
          context_.result = await this.pipeline.updateDependencies(config, this.helmClient(config), chartDirectory => {
            task.output = `Updating dependencies of ${chartDirectory}`;
          });
          if (context_.result.state === PipelineState.SKIPPED) {
            task.skip('Skip dependency update');
          }
        },
      },
    ]);
    return context_.result;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: DependencyUpdateCommand.COMMAND_NAME,
      describe: 'Run helm dependency update on every chart',
      builder: Flags.optionsOf(...Flags.DEPENDENCY_UPDATE_FLAGS),
      handler: async (argv: ArgvStruct) => {
        await this.updateDependencies(argv);
      },
    };
  }
}
