// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';

import {DefaultHelmClientBuilder} from '../../../../../src/integration/helm/impl/default-helm-client-builder.js';
import {DefaultHelmClientFactory} from '../../../../../src/integration/helm/impl/default-helm-client-factory.js';
import {type HelmClient} from '../../../../../src/integration/helm/helm-client.js';
import {PackageChartOptionsBuilder} from '../../../../../src/integration/helm/model/package/package-chart-options-builder.js';
import {LintChartOptions} from '../../../../../src/integration/helm/model/lint/lint-chart-options.js';
import {TemplateChartOptions} from '../../../../../src/integration/helm/model/template/template-chart-options.js';
import {ExternalToolError} from '../../../../../src/core/errors/external-tool-error.js';
import {ConfigurationError} from '../../../../../src/core/errors/configuration-error.js';
import {createTemporaryDirectory, FakeHelm, removeDirectory, stubLogger} from '../../../../test-utility.js';

describe('DefaultHelmClient', () => {
  let directory: string;
  let helm: FakeHelm;
  let client: HelmClient;

  beforeEach(() => {
    directory = createTemporaryDirectory('client');
    helm = new FakeHelm(directory, {failOn: 'charts/broken', stdout: 'kind: ConfigMap\n'});
    client = new DefaultHelmClientFactory(stubLogger()).getClient(helm.executable, directory);
  });

  afterEach(() => {
    removeDirectory(directory);
  });

  it('should package a signed chart with the passphrase on standard input', async () => {
    const options = PackageChartOptionsBuilder.builder()
      .destination('/out')
      .version('0.1.0')
      .keyring('secring.gpg')
      .key('release')
      .passphrase('test-secret')
      .build();

    await client.packageChart('charts/a', options);

    const [invocation] = helm.invocations();
    expect(invocation.args).to.deep.equal([
      'package',
      'charts/a',
      '--destination',
      '/out',
      '--version',
      '0.1.0',
      '--sign',
      '--keyring',
      'secring.gpg',
      '--key',
      'release',
      '--passphrase-file',
      '-',
    ]);
    expect(invocation.stdin).to.equal('test-secret');
  });

  it('should lint a chart', async () => {
    await client.lintChart('charts/a', new LintChartOptions(true, []));
    expect(helm.invocations()[0].args).to.deep.equal(['lint', 'charts/a', '--strict']);
  });

  it('should return the rendered manifests', async () => {
    const manifests = await client.templateChart('charts/a', TemplateChartOptions.DEFAULT);
    expect(manifests).to.equal('kind: ConfigMap');
  });

  it('should update dependencies', async () => {
    await client.dependencyUpdate('charts/a');
    expect(helm.invocations()[0].args).to.deep.equal(['dependency', 'update', 'charts/a']);
  });

  it('should name the chart directory when helm fails', async () => {
    await expect(
      client.packageChart('charts/broken', PackageChartOptionsBuilder.builder().build()),
    ).to.be.rejectedWith(ExternalToolError, 'Unable to package chart at charts/broken (exit code 1)');
  });

  it('should reject a blank helm executable', () => {
    expect(() => new DefaultHelmClientBuilder(stubLogger()).helmExecutable(' ').build()).to.throw(ConfigurationError);
  });
});
