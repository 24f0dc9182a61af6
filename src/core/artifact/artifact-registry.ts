// SPDX-License-Identifier: Apache-2.0

import {type ModuleIdentity} from './module-identity.js';

export interface ArtifactRegistry {
  /**
   * Record `file` as the artifact file of `module`, replacing any earlier registration.
   */
  setArtifactFile(module: ModuleIdentity, file: string): void;
}
