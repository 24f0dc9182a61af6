// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type Options} from '../options.js';

/**
 * The options to be supplied to the helm package command.
 *
 * @param destination - location to write the chart.
 * @param version     - set the version on the chart to this semver version.
 * @param appVersion  - set the appVersion on the chart to this version.
 * @param keyring     - location of a public keyring used for signing.
 * @param key         - name of the key to use when signing.
 * @param passphrase  - passphrase of the signing key, handed to helm on standard input.
 */
export class PackageChartOptions implements Options {
  public constructor(
    public readonly destination: string | null,
    public readonly version: string | null,
    public readonly appVersion: string | null,
    public readonly keyring: string | null,
    public readonly key: string | null,
    private readonly passphrase: string | null,
  ) {}

  /**
   * Signing needs both a keyring and the name of a key in it.
   */
  public get signing(): boolean {
    return !!this.keyring && !!this.key;
  }

  public apply(builder: HelmExecutionBuilder): HelmExecutionBuilder {
    let result = builder
      .argument('destination', this.destination)
      .argument('version', this.version)
      .argument('app-version', this.appVersion);

    if (this.signing && this.keyring && this.key) {
      result = result.flag('sign').argument('keyring', this.keyring).argument('key', this.key);
      if (this.passphrase) {
        result = result.argumentFromStandardInput('passphrase-file', this.passphrase);
      }
    }

    return result;
  }

  public toString(): string {
    return (
      `PackageChartOptions{destination=${this.destination}, version=${this.version}, appVersion=${this.appVersion}, ` +
      `keyring=${this.keyring}, key=${this.key}, passphrase=${this.passphrase ? '****' : null}}`
    );
  }
}
