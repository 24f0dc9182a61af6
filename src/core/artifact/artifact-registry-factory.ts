// SPDX-License-Identifier: Apache-2.0

import {type ArtifactRegistry} from './artifact-registry.js';

export interface ArtifactRegistryFactory {
  /**
   * Get the registry backed by the given registry file
   * @param registryFile - where registrations are stored
   */
  getRegistry(registryFile: string): ArtifactRegistry;
}
