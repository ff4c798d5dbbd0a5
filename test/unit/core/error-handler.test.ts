// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import {ErrorHandler} from '../../../src/core/error-handler.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {ValidationError} from '../../../src/data/configuration/api/validation-error.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('ErrorHandler', (): void => {
  let originalExitCode: typeof process.exitCode;
  let logger: RecordingLogger;
  let handler: ErrorHandler;

  beforeEach((): void => {
    originalExitCode = process.exitCode;
    logger = new RecordingLogger();
    handler = new ErrorHandler(logger);
  });

  afterEach((): void => {
    process.exitCode = originalExitCode;
  });

  it('shows the error and exits with 1', (): void => {
    expect(handler.handle(new ValidationError(['required option "repo" is unset']))).to.equal(1);

    expect(process.exitCode).to.equal(1);
    expect(logger.messages('userError')).to.deep.equal(['Invalid configuration: required option "repo" is unset']);
  });

  it('treats a user break as success', (): void => {
    expect(handler.handle(new UserBreak('displayed help, exiting'))).to.equal(0);

    expect(process.exitCode).to.equal(0);
    expect(logger.messages('userError')).to.be.empty;
    expect(logger.messages('info')).to.deep.equal(['displayed help, exiting']);
  });
});
