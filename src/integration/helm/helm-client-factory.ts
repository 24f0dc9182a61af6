// SPDX-License-Identifier: Apache-2.0

import {type HelmClient} from './helm-client.js';

export interface HelmClientFactory {
  /**
   * Returns a client running the given helm executable in the given working directory.
   */
  getClient(helmExecutable: string, workingDirectory: string): HelmClient;
}
