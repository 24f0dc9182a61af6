// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type PipelineLogger} from './core/logging/pipeline-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {PipelineError} from './core/errors/pipeline-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getPipelineVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: PipelineLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error('Error initializing container', error);
    throw new PipelineError('Error initializing container', error);
  }

  const logger = container.resolve<PipelineLogger>(InjectTokens.PipelineLogger);

  if (context) {
    // save the logger so that the entrypoint can use it to report completion
    context.logger = logger;
  }

  logger.debug('Initializing helm-pipeline CLI');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n*************************** helm-pipeline ****************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getPipelineVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('helm-pipeline')
    .usage('Usage:\n  helm-pipeline <command> [options]')
    .alias('h', 'help')
    .version(false)
    .command(commands.Initialize())
    .strict()
    .demandCommand(1, 'Select a command')
    .fail((message, error, yargsInstance) => {
      if (error) {
        throw error;
      }
      logger.showUser(message);
      yargsInstance.showHelp();
      throw new PipelineError(`Invalid command line: ${message}`);
    });

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
