// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {RunnerExecutionBuilder} from '../../../../../src/integration/runner/execution/runner-execution-builder.js';
import {type RunnerCommand} from '../../../../../src/integration/runner/execution/runner-command.js';

describe('RunnerExecutionBuilder', (): void => {
  it('places subcommands and positionals before options in the order they were added', (): void => {
    const command: RunnerCommand = new RunnerExecutionBuilder()
      .executable('go')
      .argument('run', 'TestOperator')
      .subcommands('test')
      .flag('race')
      .positional('example.com/e2e')
      .build();

    expect(command.executable).to.equal('go');
    expect(command.arguments).to.deep.equal(['test', 'example.com/e2e', '-run', 'TestOperator', '-race']);
  });

  it('skips optional arguments without a value', (): void => {
    const command: RunnerCommand = new RunnerExecutionBuilder()
      .executable('go')
      .optionalArgument('context1', undefined)
      .optionalArgument('context2', '')
      .optionalArgument('context3', 'kind-a')
      .build();

    expect(command.arguments).to.deep.equal(['-context3', 'kind-a']);
  });

  it('collects environment variables into the overlay', (): void => {
    const command: RunnerCommand = new RunnerExecutionBuilder()
      .executable('go')
      .environmentVariable('TESTDIR', '/src/operator')
      .build();

    expect(command.environmentOverlay).to.deep.equal({TESTDIR: '/src/operator'});
  });

  it('masks secret arguments when rendered', (): void => {
    const command: RunnerCommand = new RunnerExecutionBuilder()
      .executable('go')
      .secretArgument('docker-password', 'test-secret')
      .build();

    expect(command.arguments).to.deep.equal(['-docker-password', 'test-secret']);
    expect(command.toString()).to.equal("go -docker-password '******'");
  });

  it('requires an executable', (): void => {
    expect((): RunnerCommand => new RunnerExecutionBuilder().flag('v').build()).to.throw(
      Error,
      'runnerExecutable must not be null',
    );
  });

  it('rejects empty names and values', (): void => {
    const builder: RunnerExecutionBuilder = new RunnerExecutionBuilder();

    expect((): RunnerExecutionBuilder => builder.argument('', 'value')).to.throw(Error, 'name must not be null');
    expect((): RunnerExecutionBuilder => builder.argument('name', '')).to.throw(Error, 'value must not be null');
    expect((): RunnerExecutionBuilder => builder.environmentVariable('TESTDIR', '')).to.throw(
      Error,
      'value must not be null',
    );
  });
});
