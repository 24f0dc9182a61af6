// SPDX-License-Identifier: Apache-2.0

/**
 * The document a {@link FileArtifactRegistry} writes for the publishing stage.
 */
export interface ArtifactRegistration {
  module: string;
  version: string | null;
  file: string;
  registeredAt: string;
}
