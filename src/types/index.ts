// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';

// NOTE: DO NOT add any helm-pipeline imports in this file to avoid circular dependencies

// eslint-disable-next-line @typescript-eslint/ban-types
export type CommandDefinition = CommandModule<{}, Record<string, unknown>>;
