// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {PipelineError} from '../../../src/core/errors/pipeline-error.js';
import {ConfigurationError} from '../../../src/core/errors/configuration-error.js';
import {ExternalToolError} from '../../../src/core/errors/external-tool-error.js';
import {LaunchError} from '../../../src/core/errors/launch-error.js';
import {PlaceholderWriteError} from '../../../src/core/errors/placeholder-write-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';

describe('Errors', () => {
  const message = 'errorMessage';
  const cause = new Error('cause');

  it('should construct correct PipelineError', () => {
    const error = new PipelineError(message, cause);
    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('PipelineError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.include('Caused by: Error: cause');
  });

  it('should construct correct ConfigurationError', () => {
    const error = new ConfigurationError(message, 'timestampFormat');
    expect(error).to.be.instanceof(PipelineError);
    expect(error.name).to.equal('ConfigurationError');
    expect(error.meta).to.deep.equal({key: 'timestampFormat'});
  });

  it('should construct correct ExternalToolError', () => {
    const error = new ExternalToolError('Unable to package chart at charts/a', 2, 'out', 'err');
    expect(error).to.be.instanceof(PipelineError);
    expect(error.name).to.equal('ExternalToolError');
    expect(error.message).to.equal('Unable to package chart at charts/a (exit code 2)\nerr\nout');
    expect(error.getExitCode()).to.equal(2);
    expect(error.getStdOut()).to.equal('out');
    expect(error.getStdErr()).to.equal('err');
    expect(error.meta).to.deep.equal({exitCode: 2});
  });

  it('should leave out empty output from the ExternalToolError message', () => {
    expect(new ExternalToolError('Unable to lint', 1, '', ' ').message).to.equal('Unable to lint (exit code 1)');
  });

  it('should construct correct LaunchError', () => {
    const error = new LaunchError('/opt/helm', new Error('spawn /opt/helm ENOENT'));
    expect(error.name).to.equal('LaunchError');
    expect(error.message).to.equal(
      "Unable to launch '/opt/helm': spawn /opt/helm ENOENT. " +
        'Check that helm is installed and on the PATH, or point --helm-executable at it.',
    );
    expect(error.meta).to.deep.equal({executable: '/opt/helm'});
  });

  it('should construct correct PlaceholderWriteError', () => {
    const error = new PlaceholderWriteError('/tmp/helm.placeholder.txt', cause);
    expect(error.message).to.equal('Could not create placeholder artifact file: /tmp/helm.placeholder.txt');
    expect(error.meta).to.deep.equal({path: '/tmp/helm.placeholder.txt'});
  });

  it('should construct correct IllegalArgumentError', () => {
    const error = new IllegalArgumentError('commands must not be blank', ' ');
    expect(error).to.be.instanceof(PipelineError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.meta).to.deep.equal({value: ' '});
  });

  it('should construct correct MissingArgumentError', () => {
    const error = new MissingArgumentError(message);
    expect(error).to.be.instanceof(PipelineError);
    expect(error.name).to.equal('MissingArgumentError');
    expect(error.cause).to.be.undefined;
  });
});
