// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {spawn} from 'node:child_process';
import {container} from 'tsyringe-neo';
import {type LauncherLogger, type LogLevel} from '../logging/launcher-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {LauncherWinstonLogger} from '../logging/launcher-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {YamlObjectCodec} from '../../data/codec/impl/yaml-object-codec.js';
import {ConfigResolver} from '../config/config-resolver.js';
import {SuiteSelector} from '../../business/suite/suite-selector.js';
import {RunConfigSynthesizer} from '../../business/run-config/run-config-synthesizer.js';
import {ProcessLauncher} from '../../integration/process/process-launcher.js';
import {SignalRelay} from '../../integration/process/signal-relay.js';
import {type SpawnFunction} from '../../integration/process/child-handle.js';
import {RunCommand} from '../../commands/run-command.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

const defaultSpawn: SpawnFunction = spawn;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param launcherHomeDirectory - the directory holding the static config file
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    launcherHomeDirectory: string = constants.LAUNCHER_HOME_DIR,
    logLevel: LogLevel = 'info',
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<LauncherLogger>(InjectTokens.LauncherLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.LauncherLogger, LauncherWinstonLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.ObjectCodec, YamlObjectCodec),
      new SingletonContainer(InjectTokens.ConfigResolver, ConfigResolver),
      new SingletonContainer(InjectTokens.SuiteSelector, SuiteSelector),
      new SingletonContainer(InjectTokens.RunConfigSynthesizer, RunConfigSynthesizer),
      new SingletonContainer(InjectTokens.SignalRelay, SignalRelay),
      new SingletonContainer(InjectTokens.ProcessLauncher, ProcessLauncher),
      new SingletonContainer(InjectTokens.RunCommand, RunCommand),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.HomeDirectory, os.homedir()),
      new ValueContainer(InjectTokens.LauncherHomeDirectory, launcherHomeDirectory),
      new ValueContainer(InjectTokens.TempDirectory, os.tmpdir()),
      new ValueContainer(InjectTokens.SpawnFunction, defaultSpawn),
      new ValueContainer(InjectTokens.SignalSource, process),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(override.token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<LauncherLogger>(InjectTokens.LauncherLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   */
  public reset(
    launcherHomeDirectory?: string,
    logLevel?: LogLevel,
    developmentMode?: boolean,
    overrides?: InstanceOverrides,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<LauncherLogger>(InjectTokens.LauncherLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(launcherHomeDirectory, logLevel, developmentMode, overrides);
  }
}
