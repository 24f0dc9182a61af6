// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';

import {HelmExecutionBuilder} from '../../../../../src/integration/helm/execution/helm-execution-builder.js';
import {ExternalToolError} from '../../../../../src/core/errors/external-tool-error.js';
import {LaunchError} from '../../../../../src/core/errors/launch-error.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';
import {createTemporaryDirectory, FakeHelm, removeDirectory} from '../../../../test-utility.js';

describe('HelmExecution', () => {
  let directory: string;

  beforeEach(() => {
    directory = createTemporaryDirectory('execution');
  });

  afterEach(() => {
    removeDirectory(directory);
  });

  it('should pass the arguments without a shell', async () => {
    const helm = new FakeHelm(directory, {stdout: 'done\n'});
    const execution = HelmExecutionBuilder.create(helm.executable, directory)
      .subcommands('package')
      .positional('charts/my chart')
      .argument('version', '1.0.0; echo injected')
      .build();

    await execution.call();

    expect(execution.exitCode()).to.equal(0);
    expect(execution.standardOutput()).to.equal('done');
    const [invocation] = helm.invocations();
    expect(invocation.args).to.deep.equal(['package', 'charts/my chart', '--version', '1.0.0; echo injected']);
    expect(invocation.cwd).to.equal(fs.realpathSync(directory));
  });

  it('should keep blank lines and multi-byte characters of the output', async () => {
    const manifests = 'kind: Service\n\n---\nkind: ConfigMap\r\n';
    const large = 'a' + 'é'.repeat(40_000);
    const helm = new FakeHelm(directory, {stdout: `${manifests}${large}\n`});
    const execution = HelmExecutionBuilder.create(helm.executable, directory).subcommands('template').build();

    await execution.call();

    expect(execution.standardOutput()).to.equal(`kind: Service\n\n---\nkind: ConfigMap\n${large}`);
  });

  it('should write the standard input and close it', async () => {
    const helm = new FakeHelm(directory);
    await HelmExecutionBuilder.create(helm.executable, directory)
      .subcommands('package')
      .argumentFromStandardInput('passphrase-file', 'test-secret')
      .build()
      .call();

    const [invocation] = helm.invocations();
    expect(invocation.args).to.deep.equal(['package', '--passphrase-file', '-']);
    expect(invocation.stdin).to.equal('test-secret');
  });

  it('should close the standard input right away when there is none', async () => {
    const helm = new FakeHelm(directory);
    await HelmExecutionBuilder.create(helm.executable, directory).subcommands('version').build().call();

    expect(helm.invocations()[0].stdin).to.equal('');
  });

  it('should fail with the exit code and output on a non-zero exit', async () => {
    const helm = new FakeHelm(directory, {exitCode: 3});
    const execution = HelmExecutionBuilder.create(helm.executable, directory).subcommands('package').build();

    try {
      await execution.call('Unable to package chart at charts/a');
      expect.fail('expected an error');
    } catch (error) {
      expect(error).to.be.instanceOf(ExternalToolError);
      if (error instanceof ExternalToolError) {
        expect(error.getExitCode()).to.equal(3);
        expect(error.getStdErr()).to.equal('Error: chart failed');
        expect(error.message).to.equal('Unable to package chart at charts/a (exit code 3)\nError: chart failed');
      }
    }
    expect(execution.exitCode()).to.equal(3);
  });

  it('should fail with a launch error when the executable does not exist', async () => {
    const execution = HelmExecutionBuilder.create(PathEx.join(directory, 'no-such-helm'), directory)
      .subcommands('package')
      .build();

    await expect(execution.call()).to.be.rejectedWith(LaunchError, 'Unable to launch');
  });
});
