// SPDX-License-Identifier: Apache-2.0

import {PackageCommand} from './package.js';
import {LintCommand} from './lint.js';
import {TemplateCommand} from './template.js';
import {DependencyUpdateCommand} from './dependency-update.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
export function Initialize(): CommandDefinition[] {
  return [
    new DependencyUpdateCommand().getCommandDefinition(),
    new LintCommand().getCommandDefinition(),
    new TemplateCommand().getCommandDefinition(),
    new PackageCommand().getCommandDefinition(),
  ];
}
