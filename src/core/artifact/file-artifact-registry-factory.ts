// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ArtifactRegistryFactory} from './artifact-registry-factory.js';
import {type ArtifactRegistry} from './artifact-registry.js';
import {FileArtifactRegistry} from './file-artifact-registry.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type Clock} from '../time/clock.js';
import {PathEx} from '../../business/utils/path-ex.js';

@injectable()
export class FileArtifactRegistryFactory implements ArtifactRegistryFactory {
  private readonly registries: Map<string, ArtifactRegistry> = new Map<string, ArtifactRegistry>();
  private readonly clock: Clock;

  public constructor(@inject(InjectTokens.Clock) clock?: Clock) {
    this.clock = patchInject(clock, InjectTokens.Clock, this.constructor.name);
  }

  public getRegistry(registryFile: string): ArtifactRegistry {
    const key = PathEx.resolve(registryFile);
    let registry = this.registries.get(key);
    if (!registry) {
      registry = new FileArtifactRegistry(key, this.clock);
      this.registries.set(key, registry);
    }
    return registry;
  }
}
