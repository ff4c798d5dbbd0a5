// SPDX-License-Identifier: Apache-2.0

import {EventEmitter} from 'node:events';
import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {ProcessLauncher} from '../../../../src/integration/process/process-launcher.js';
import {SignalRelay} from '../../../../src/integration/process/signal-relay.js';
import {type ExitStatus} from '../../../../src/integration/process/exit-status.js';
import {RunnerCommand} from '../../../../src/integration/runner/execution/runner-command.js';
import {RunnerLaunchError} from '../../../../src/integration/runner/errors/runner-launch-error.js';
import {type FakeChildProcess, FakeSpawner} from '../../../helpers/fake-child-process.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

describe('ProcessLauncher', (): void => {
  const command: RunnerCommand = new RunnerCommand('go', ['test', '-v'], {TESTDIR: '/src/operator'});
  let logger: RecordingLogger;
  let signals: EventEmitter;
  let relay: SignalRelay;

  beforeEach((): void => {
    logger = new RecordingLogger();
    signals = new EventEmitter();
    relay = new SignalRelay(logger, signals);
  });

  it('spawns the command with inherited stdio and the overlaid environment', async (): Promise<void> => {
    const spawner: FakeSpawner = new FakeSpawner();
    const launcher: ProcessLauncher = new ProcessLauncher(logger, spawner.spawn, relay);

    const status: ExitStatus = await launcher.launch(command);

    expect(status).to.deep.equal({code: 0, signal: null});
    expect(spawner.calls).to.have.lengthOf(1);
    expect(spawner.calls[0].command).to.equal('go');
    expect(spawner.calls[0].arguments_).to.deep.equal(['test', '-v']);
    expect(spawner.calls[0].options.stdio).to.equal('inherit');
    expect(spawner.calls[0].options.shell).to.equal(false);
    expect(spawner.calls[0].options.env?.TESTDIR).to.equal('/src/operator');
    expect(logger.messages('info')).to.deep.equal(['Executing command: go test -v']);
  });

  it('returns a non-zero exit as a status, not an error', async (): Promise<void> => {
    const spawner: FakeSpawner = new FakeSpawner((child: FakeChildProcess): void => {
      setImmediate((): void => child.exit(2));
    });
    const launcher: ProcessLauncher = new ProcessLauncher(logger, spawner.spawn, relay);

    expect(await launcher.launch(command)).to.deep.equal({code: 2, signal: null});
  });

  it('relays signals to the child until it exits', async (): Promise<void> => {
    const spawner: FakeSpawner = new FakeSpawner((child: FakeChildProcess): void => {
      setImmediate((): void => {
        signals.emit('SIGINT', 'SIGINT');
        child.exit(null, 'SIGINT');
      });
    });
    const launcher: ProcessLauncher = new ProcessLauncher(logger, spawner.spawn, relay);

    const status: ExitStatus = await launcher.launch(command);

    expect(status).to.deep.equal({code: null, signal: 'SIGINT'});
    expect(spawner.children[0].killed).to.deep.equal(['SIGINT']);
    expect(relay.attached).to.be.false;
    expect(signals.listenerCount('SIGINT')).to.equal(0);
  });

  it('reports a child that cannot be started as a RunnerLaunchError', async (): Promise<void> => {
    const spawner: FakeSpawner = new FakeSpawner((child: FakeChildProcess): void => {
      setImmediate((): void => child.fail(Object.assign(new Error('spawn go ENOENT'), {code: 'ENOENT'})));
    });
    const launcher: ProcessLauncher = new ProcessLauncher(logger, spawner.spawn, relay);

    try {
      await launcher.launch(command);
      expect.fail('expected a RunnerLaunchError');
    } catch (error) {
      expect(error).to.be.instanceOf(RunnerLaunchError);
      if (error instanceof RunnerLaunchError) {
        expect(error.message).to.equal("Failed to start the test runner 'go': spawn go ENOENT");
        expect(error.statusCode).to.equal('ENOENT');
        expect(error.executable).to.equal('go');
      }
    }
    expect(relay.attached).to.be.false;
  });

  it('wraps a spawn that throws', async (): Promise<void> => {
    const launcher: ProcessLauncher = new ProcessLauncher(
      logger,
      (): never => {
        throw new Error('invalid argument');
      },
      relay,
    );

    try {
      await launcher.launch(command);
      expect.fail('expected a RunnerLaunchError');
    } catch (error) {
      expect(error).to.be.instanceOf(RunnerLaunchError);
    }
    expect(relay.attached).to.be.false;
  });
});
