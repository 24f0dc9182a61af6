// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';

import {ErrorHandler} from '../../../src/core/error-handler.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {SilentBreak} from '../../../src/core/errors/silent-break.js';
import {PipelineError} from '../../../src/core/errors/pipeline-error.js';
import {stubLogger} from '../../test-utility.js';

describe('ErrorHandler', () => {
  let logger: ReturnType<typeof stubLogger>;
  let handler: ErrorHandler;
  let exitCode: typeof process.exitCode;

  beforeEach(() => {
    exitCode = process.exitCode;
    logger = stubLogger();
    handler = new ErrorHandler(logger);
  });

  afterEach(() => {
    process.exitCode = exitCode;
  });

  it('should show errors to the user and fail the process', () => {
    const error = new PipelineError('Error running package');
    handler.handle(error);

    expect(logger.showUserError).to.have.been.calledOnceWithExactly(error);
    expect(process.exitCode).to.equal(1);
  });

  it('should show a user break without failing', () => {
    handler.handle(new PipelineError('wrapped', new UserBreak('displayed version information, exiting')));

    expect(logger.showUser).to.have.been.calledOnceWithExactly('displayed version information, exiting');
    expect(logger.showUserError).to.not.have.been.called;
    expect(process.exitCode).to.equal(exitCode);
  });

  it('should only log a silent break', () => {
    handler.handle(new SilentBreak('nothing to do'));

    expect(logger.info).to.have.been.calledOnceWithExactly('nothing to do');
    expect(logger.showUser).to.not.have.been.called;
  });
});
