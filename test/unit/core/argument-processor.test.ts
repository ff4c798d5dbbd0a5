// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {ArgumentProcessor, type ParsedArguments} from '../../../src/argument-processor.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {ValueContainer} from '../../../src/core/dependency-injection/value-container.js';
import {type SingletonContainer} from '../../../src/core/dependency-injection/singleton-container.js';
import {LauncherError} from '../../../src/core/errors/launcher-error.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';
import {resetTestContainer} from '../../test-container.js';

function failureOf(argv: string[]): unknown {
  try {
    ArgumentProcessor.process(argv);
  } catch (error) {
    return error;
  }
  return expect.fail('expected the command line to be rejected');
}

describe('ArgumentProcessor', (): void => {
  let logger: RecordingLogger;

  beforeEach((): void => {
    logger = new RecordingLogger();
    resetTestContainer(
      '/nonexistent',
      new Map<symbol, ValueContainer | SingletonContainer>([
        [InjectTokens.LauncherLogger, new ValueContainer(InjectTokens.LauncherLogger, logger)],
      ]),
    );
  });

  it('parses long options, aliases and repeated options', (): void => {
    const parsed: ParsedArguments = ArgumentProcessor.process([
      'node',
      'launcher.ts',
      '-n',
      'ci',
      '--repo',
      '/src/operator',
      '-t',
      'T1',
      'T2',
      '-c',
      'kind-a',
      '-c',
      'kind-b',
      '--runner-schema',
      'config-file',
    ]);

    expect(parsed.namespace).to.equal('ci');
    expect(parsed.repo).to.equal('/src/operator');
    expect(parsed.test).to.deep.equal(['T1', 'T2']);
    expect(parsed.context).to.deep.equal(['kind-a', 'kind-b']);
    expect(parsed['runner-schema']).to.equal('config-file');
  });

  it('leaves options that were not typed unset', (): void => {
    const parsed: ParsedArguments = ArgumentProcessor.process(['node', 'launcher.ts', '-s', 'sanity']);

    expect(parsed.suite).to.equal('sanity');
    expect(parsed.verbose).to.be.undefined;
    expect(parsed['dry-run']).to.be.undefined;
    expect(parsed.namespace).to.be.undefined;
    expect(parsed['runner-schema']).to.be.undefined;
  });

  it('turns on debug logging for verbose', (): void => {
    ArgumentProcessor.process(['node', 'launcher.ts', '-v', '-s', 'p0']);

    expect(logger.level).to.equal('debug');
  });

  it('turns on development mode for dev', (): void => {
    ArgumentProcessor.process(['node', 'launcher.ts', '--dev', '-s', 'p0']);

    expect(logger.developmentMode).to.be.true;
  });

  it('leaves development mode off by default', (): void => {
    ArgumentProcessor.process(['node', 'launcher.ts', '-s', 'p0']);

    expect(logger.developmentMode).to.be.false;
  });

  it('rejects an unknown option and shows help', (): void => {
    const error: unknown = failureOf(['node', 'launcher.ts', '--bogus']);

    expect(error).to.be.instanceOf(LauncherError);
    expect(logger.messages('user')[0]).to.equal('Unknown argument: bogus');
    expect(logger.text()).to.contain('--namespace');
  });

  it('rejects an unknown suite alias', (): void => {
    const error: unknown = failureOf(['node', 'launcher.ts', '--suite', 'nightly']);

    expect(error).to.be.instanceOf(LauncherError);
    expect(error instanceof Error ? error.message : '').to.contain('Invalid values');
  });

  it('rejects a suite together with tests', (): void => {
    const error: unknown = failureOf(['node', 'launcher.ts', '--suite', 'sanity', '--test', 'T1']);

    expect(error).to.be.instanceOf(LauncherError);
    expect(error instanceof Error ? error.message : '').to.contain('mutually exclusive');
  });

  it('shows help and stops', (): void => {
    const error: unknown = failureOf(['node', 'launcher.ts', '-h']);

    expect(error).to.be.instanceOf(UserBreak);
    expect(logger.text()).to.contain('--runner-schema');
  });
});
