// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonStubbedInstance} from 'sinon';

import {PackageCommand} from '../../../src/commands/package.js';
import {LintCommand} from '../../../src/commands/lint.js';
import {ChartPipeline, PipelineState} from '../../../src/core/chart-pipeline.js';
import {ConfigurationLoader} from '../../../src/core/config/configuration-loader.js';
import {PipelineError} from '../../../src/core/errors/pipeline-error.js';
import {ExternalToolError} from '../../../src/core/errors/external-tool-error.js';
import {type HelmClient} from '../../../src/integration/helm/helm-client.js';
import {type ArtifactRegistry} from '../../../src/core/artifact/artifact-registry.js';
import {type ArgvStruct} from '../../../src/types/aliases.js';
import {createTemporaryDirectory, removeDirectory, stubLogger} from '../../test-utility.js';

describe('PackageCommand', () => {
  let project: string;
  let logger: ReturnType<typeof stubLogger>;
  let pipeline: SinonStubbedInstance<ChartPipeline>;
  let helm: HelmClient;
  let registry: ArtifactRegistry;
  let helmClientFactory: {getClient: sinon.SinonStub<[string, string], HelmClient>};
  let artifactRegistryFactory: {getRegistry: sinon.SinonStub<[string], ArtifactRegistry>};
  let command: PackageCommand;

  const argv = (values: Record<string, unknown>): ArgvStruct => ({
    _: ['package'],
    'quiet-mode': true,
    'project-directory': project,
    ...values,
  });

  beforeEach(() => {
    project = createTemporaryDirectory('command');
    logger = stubLogger();
    pipeline = sinon.createStubInstance(ChartPipeline);
    helm = {
      packageChart: sinon.stub(),
      lintChart: sinon.stub(),
      templateChart: sinon.stub(),
      dependencyUpdate: sinon.stub(),
    };
    registry = {setArtifactFile: sinon.stub()};
    helmClientFactory = {getClient: sinon.stub<[string, string], HelmClient>().returns(helm)};
    artifactRegistryFactory = {getRegistry: sinon.stub<[string], ArtifactRegistry>().returns(registry)};
    command = new PackageCommand(
      logger,
      new ConfigurationLoader(logger),
      pipeline,
      helmClientFactory,
      artifactRegistryFactory,
    );
  });

  afterEach(() => {
    removeDirectory(project);
  });

  it('should hand the loaded configuration to the pipeline', async () => {
    pipeline.package.resolves({state: PipelineState.DONE, charts: ['charts/a'], version: '0.1.0'});

    const result = await command.package(argv({'chart-version': '0.1.0', 'helm-executable': '/opt/helm'}));

    expect(result.charts).to.deep.equal(['charts/a']);
    expect(helmClientFactory.getClient).to.have.been.calledOnceWithExactly('/opt/helm', project);
    expect(artifactRegistryFactory.getRegistry).to.have.been.calledOnce;
    const [config, client, usedRegistry] = pipeline.package.getCall(0).args;
    expect(config.chartVersion).to.equal('0.1.0');
    expect(client).to.equal(helm);
    expect(usedRegistry).to.equal(registry);
    expect(logger.showList).to.have.been.calledWith('Packaged charts', ['charts/a']);
  });

  it('should report a skipped run', async () => {
    pipeline.package.resolves({state: PipelineState.SKIPPED, charts: [], version: null});

    const result = await command.package(argv({'skip-package': true}));

    expect(result.state).to.equal(PipelineState.SKIPPED);
    expect(pipeline.package.getCall(0).args[0].skipPackage).to.be.true;
  });

  it('should only take the flags of the command', async () => {
    pipeline.package.resolves({state: PipelineState.DONE, charts: [], version: null});

    await command.package(argv({'lint-strict': true}));

    expect(pipeline.package.getCall(0).args[0].lintStrict).to.be.false;
  });

  it('should name the command and the cause when it fails', async () => {
    pipeline.package.rejects(new ExternalToolError('Unable to package chart at charts/a', 1));

    await expect(command.package(argv({}))).to.be.rejectedWith(
      PipelineError,
      'Error running package: Unable to package chart at charts/a (exit code 1)',
    );
  });

  it('should fail before packaging on a bad configuration', async () => {
    await expect(command.package(argv({'timestamp-format': 'QQ'}))).to.be.rejectedWith(
      PipelineError,
      "Error running package: Unknown pattern letter 'Q' in timestamp format: QQ",
    );
    expect(pipeline.package).to.not.have.been.called;
  });

  it('should apply the configured logging settings', async () => {
    pipeline.package.resolves({state: PipelineState.DONE, charts: [], version: null});

    await command.package(argv({dev: true, 'log-level': 'debug', passphrase: 'test-secret'}));

    expect(logger.setLogLevel).to.have.been.calledWith('debug');
    expect(logger.setDevMode).to.have.been.calledWith(true);
    const [, lines] = logger.showList.getCall(0).args;
    expect(lines).to.include('passphrase: ********');
    expect(lines).to.not.include('passphrase: test-secret');
  });

  it('should describe the yargs command', () => {
    const definition = command.getCommandDefinition();
    expect(definition.command).to.equal('package');
    expect(definition.builder).to.have.property('chart-version');
    expect(definition.builder).to.not.have.property('lint-strict');
  });
});

describe('LintCommand', () => {
  it('should run lint with the lint flags', async () => {
    const project = createTemporaryDirectory('lint-command');
    const logger = stubLogger();
    const pipeline = sinon.createStubInstance(ChartPipeline);
    pipeline.lint.resolves({state: PipelineState.DONE, charts: ['charts/a']});
    const helm: HelmClient = {
      packageChart: sinon.stub(),
      lintChart: sinon.stub(),
      templateChart: sinon.stub(),
      dependencyUpdate: sinon.stub(),
    };
    const command = new LintCommand(logger, new ConfigurationLoader(logger), pipeline, {getClient: () => helm});

    try {
      const result = await command.lint({_: ['lint'], 'quiet-mode': true, 'project-directory': project, 'lint-strict': true});

      expect(result.charts).to.deep.equal(['charts/a']);
      expect(pipeline.lint.getCall(0).args[0].lintStrict).to.be.true;
    } finally {
      removeDirectory(project);
    }
  });
});
