// SPDX-License-Identifier: Apache-2.0

import {PackageChartOptions} from './package-chart-options.js';

/**
 * The builder for the PackageChartOptions.
 */
export class PackageChartOptionsBuilder {
  private _destination: string | null = null;
  private _version: string | null = null;
  private _appVersion: string | null = null;
  private _keyring: string | null = null;
  private _key: string | null = null;
  private _passphrase: string | null = null;

  private constructor() {}

  /**
   * Returns an instance of the PackageChartOptionsBuilder.
   */
  public static builder(): PackageChartOptionsBuilder {
    return new PackageChartOptionsBuilder();
  }

  /**
   * location to write the chart archive to.
   */
  public destination(destination: string | null | undefined): PackageChartOptionsBuilder {
    this._destination = destination ?? null;
    return this;
  }

  /**
   * set the version on the chart to this semver version, left out when null.
   */
  public version(version: string | null | undefined): PackageChartOptionsBuilder {
    this._version = version ?? null;
    return this;
  }

  public appVersion(appVersion: string | null | undefined): PackageChartOptionsBuilder {
    this._appVersion = appVersion ?? null;
    return this;
  }

  public keyring(keyring: string | null | undefined): PackageChartOptionsBuilder {
    this._keyring = keyring ?? null;
    return this;
  }

  public key(key: string | null | undefined): PackageChartOptionsBuilder {
    this._key = key ?? null;
    return this;
  }

  /**
   * passphrase of the signing key. Only used when signing, and only ever passed on standard input.
   */
  public passphrase(passphrase: string | null | undefined): PackageChartOptionsBuilder {
    this._passphrase = passphrase ?? null;
    return this;
  }

  public build(): PackageChartOptions {
    return new PackageChartOptions(
      this._destination,
      this._version,
      this._appVersion,
      this._keyring,
      this._key,
      this._passphrase,
    );
  }
}
