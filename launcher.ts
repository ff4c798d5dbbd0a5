#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as fnm from './src/index.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: fnm.LauncherContext = {};
await fnm
  .main(process.argv, context)
  .then((exitCode: number): void => {
    context.logger?.debug(`Launcher completed with exit code ${exitCode}`);
    process.exitCode = exitCode;
  })
  .catch((error: unknown): void => {
    const errorHandler: ErrorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
