// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type LauncherLogger, type LogLevel} from './launcher-logger.js';
import {ValidationError} from '../../data/configuration/api/validation-error.js';

const customFormat: winston.Logform.Format = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  // convert levels to upper case
  winston.format((data: winston.Logform.TransformableInfo): winston.Logform.TransformableInfo => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(
    (data: winston.Logform.TransformableInfo): string => `${String(data.timestamp)}|${data.level}| ${String(data.message)}`,
  ),
);

interface ErrorFrame {
  message: string;
  stacktrace?: string;
}

@injectable()
export class LauncherWinstonLogger implements LauncherLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private developmentMode: boolean;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: LogLevel,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
  ) {
    const level: LogLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level,
      format: customFormat,
      transports: [new winston.transports.Console()],
    });
  }

  public setLevel(level: LogLevel): void {
    this.winstonLogger.level = level;
    this.debug(`log level: ${level}`);
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: ErrorFrame[] = [];
    let cause: unknown = error;
    let depth: number = 0;
    while (cause instanceof Error && depth < 10) {
      stack.push({message: cause.message, stacktrace: cause.stack});
      cause = cause.cause;
      depth += 1;
    }
    if (stack.length === 0) {
      stack.push({message: String(error)});
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          // Remove everything after the first "Caused by: " and add indentation
          const formattedStacktrace: string = s.stacktrace
            .replace(/Caused by:.*/s, '')
            .replaceAll(/\n\s*/g, '\n' + indent)
            .trim();
          console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of stack[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    if (error instanceof ValidationError) {
      for (const problem of error.problems) {
        console.log(chalk.yellow(` - ${problem}`));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(stack[0].message);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.error(util.format(message, ...arguments_), this.prepMeta());
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(util.format(message, ...arguments_), this.prepMeta());
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.info(util.format(message, ...arguments_), this.prepMeta());
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(util.format(message, ...arguments_), this.prepMeta());
  }

  public showList(title: string, items: string[] = []): boolean {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }

    this.showUser('\n');
    return true;
  }
}
