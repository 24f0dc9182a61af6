// SPDX-License-Identifier: Apache-2.0

import {BaseCommand, type CommandContext} from './base.js';
import {Flags} from './flags.js';
import {type GoalResult, PipelineState} from '../core/chart-pipeline.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

interface TemplateContext extends CommandContext {
  result: GoalResult;
}

export class TemplateCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'template';

  public async template(argv: ArgvStruct): Promise<GoalResult> {
    const context_ = await this.runTasks<TemplateContext>(TemplateCommand.COMMAND_NAME, argv, [
      this.loadConfigurationTask(argv, Flags.TEMPLATE_FLAGS),
      {
        title: 'Render chart templates',
        task: async (context_, task) => {
          const config = context_.config;
          context_.result = await this.pipeline.template(config, this.helmClient(config), chartDirectory => {
            task.output = `Rendering ${chartDirectory}`;
          });
          if (context_.result.state === PipelineState.SKIPPED) {
            task.skip('Skip template');
          }
        },
      },
    ]);
    return context_.result;
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: TemplateCommand.COMMAND_NAME,
      describe: 'Run helm template on every chart',
      builder: Flags.optionsOf(...Flags.TEMPLATE_FLAGS),
      handler: async (argv: ArgvStruct) => {
        await this.template(argv);
      },
    };
  }
}
