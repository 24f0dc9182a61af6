// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  alias?: string;
  type: 'boolean' | 'string' | 'array';
  /** shown instead of the value wherever flags are displayed */
  dataMask?: string;
}
