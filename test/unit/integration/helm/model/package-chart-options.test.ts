// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {HelmExecutionBuilder} from '../../../../../src/integration/helm/execution/helm-execution-builder.js';
import {PackageChartOptionsBuilder} from '../../../../../src/integration/helm/model/package/package-chart-options-builder.js';

describe('PackageChartOptions', () => {
  const base = HelmExecutionBuilder.create('helm', '/tmp/project');

  it('should render destination, version and app version', () => {
    const options = PackageChartOptionsBuilder.builder()
      .destination('/out')
      .version('1.0.0')
      .appVersion('2.0.0')
      .build();

    expect(options.apply(base).arguments()).to.deep.equal([
      '--destination',
      '/out',
      '--version',
      '1.0.0',
      '--app-version',
      '2.0.0',
    ]);
  });

  it('should sign when keyring and key are set', () => {
    const options = PackageChartOptionsBuilder.builder().keyring('/keys/secring.gpg').key('release').build();

    expect(options.signing).to.be.true;
    expect(options.apply(base).arguments()).to.deep.equal([
      '--sign',
      '--keyring',
      '/keys/secring.gpg',
      '--key',
      'release',
    ]);
  });

  it('should not sign with only one of keyring and key', () => {
    const keyringOnly = PackageChartOptionsBuilder.builder().keyring('/keys/secring.gpg').passphrase('test-secret').build();
    const keyOnly = PackageChartOptionsBuilder.builder().key('release').passphrase('test-secret').build();

    expect(keyringOnly.signing).to.be.false;
    expect(keyringOnly.apply(base).arguments()).to.deep.equal([]);
    expect(keyOnly.signing).to.be.false;
    expect(keyOnly.apply(base).arguments()).to.deep.equal([]);
  });

  it('should hand the passphrase over on standard input', () => {
    const options = PackageChartOptionsBuilder.builder()
      .keyring('/keys/secring.gpg')
      .key('release')
      .passphrase('test-secret')
      .build();

    expect(options.apply(base).arguments()).to.deep.equal([
      '--sign',
      '--keyring',
      '/keys/secring.gpg',
      '--key',
      'release',
      '--passphrase-file',
      '-',
    ]);
  });

  it('should ignore an empty passphrase', () => {
    const options = PackageChartOptionsBuilder.builder().keyring('/keys/secring.gpg').key('release').passphrase('').build();
    expect(options.apply(base).arguments()).to.not.include('--passphrase-file');
  });

  it('should mask the passphrase', () => {
    const options = PackageChartOptionsBuilder.builder().key('release').passphrase('test-secret').build();
    expect(options.toString()).to.equal(
      'PackageChartOptions{destination=null, version=null, appVersion=null, keyring=null, key=release, passphrase=****}',
    );
  });
});
