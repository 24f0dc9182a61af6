// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {type ArtifactRegistry} from './artifact-registry.js';
import {type ArtifactRegistration} from './artifact-registration.js';
import {type ModuleIdentity} from './module-identity.js';
import {type Clock} from '../time/clock.js';
import {PathEx} from '../../business/utils/path-ex.js';

/**
 * Keeps the module's artifact registration in a JSON file.
 */
export class FileArtifactRegistry implements ArtifactRegistry {
  public constructor(
    private readonly registryFile: string,
    private readonly clock: Clock,
  ) {}

  public setArtifactFile(module: ModuleIdentity, file: string): void {
    const registration: ArtifactRegistration = {
      module: module.name,
      version: module.version ?? null,
      file: PathEx.resolve(file),
      registeredAt: this.clock.now().toISOString(),
    };

    fs.mkdirSync(path.dirname(this.registryFile), {recursive: true});
    fs.writeFileSync(this.registryFile, JSON.stringify(registration, undefined, 2) + '\n');
  }

  /**
   * @returns the current registration, or `null` when nothing has been registered yet
   */
  public read(): ArtifactRegistration | null {
    if (!fs.existsSync(this.registryFile)) {
      return null;
    }
    const data: unknown = JSON.parse(fs.readFileSync(this.registryFile, 'utf8'));
    return isRegistration(data) ? data : null;
  }
}

function isRegistration(data: unknown): data is ArtifactRegistration {
  return (
    typeof data === 'object' &&
    data !== null &&
    'module' in data &&
    typeof data.module === 'string' &&
    'file' in data &&
    typeof data.file === 'string'
  );
}
