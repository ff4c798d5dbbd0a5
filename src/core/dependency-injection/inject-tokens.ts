// SPDX-License-Identifier: Apache-2.0

export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  LauncherHomeDirectory: Symbol.for('LauncherHomeDirectory'),
  TempDirectory: Symbol.for('TempDirectory'),
  SpawnFunction: Symbol.for('SpawnFunction'),
  LauncherLogger: Symbol.for('LauncherLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ObjectCodec: Symbol.for('ObjectCodec'),
  ConfigResolver: Symbol.for('ConfigResolver'),
  SuiteSelector: Symbol.for('SuiteSelector'),
  RunConfigSynthesizer: Symbol.for('RunConfigSynthesizer'),
  ProcessLauncher: Symbol.for('ProcessLauncher'),
  SignalSource: Symbol.for('SignalSource'),
  SignalRelay: Symbol.for('SignalRelay'),
  RunCommand: Symbol.for('RunCommand'),
} as const;
