// SPDX-License-Identifier: Apache-2.0

import pino, {type DestinationStream, type Logger as PinoLogger, type TransportTargetOptions} from 'pino';
import {mkdirSync} from 'node:fs';
import path from 'node:path';
import {v4 as uuidv4} from 'uuid';
// eslint-disable-next-line unicorn/import-style
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger, type LogMethod} from './adapter-logger.js';
import {errorChain} from '../errors/error-chain.js';
import {type Optional} from '../../types/index.js';

/**
 * Pino-based implementation of the AdapterLogger interface.
 *
 * Unless a destination stream is injected, emits two files under the logs directory:
 *  - octarine-adapter.ndjson : newline-delimited JSON (authoritative)
 *  - octarine-adapter.log    : pretty human-readable
 */
@injectable()
export class AdapterPinoLogger implements AdapterLogger {
  private readonly pinoLogger: PinoLogger;
  private traceId?: string;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace|silent)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param destination - stream receiving the NDJSON records, replaces the file outputs
   * @param logsDirectory - directory of the file outputs
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) private developmentMode?: boolean,
    @inject(InjectTokens.LogDestination) destination?: Optional<DestinationStream>,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name) ?? 'info';
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);

    this.nextTraceId();

    const stream: DestinationStream =
      destination ??
      AdapterPinoLogger.fileTransport(
        level,
        patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name),
      );

    this.pinoLogger = pino(
      {
        level,
        // Always include traceId when set via mixin
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        redact: {
          paths: ['*.authorization', '*.Authorization', '*.token', '*.password', '*.registryPassword', '*.kubeconfig'],
          remove: true,
        },
      },
      stream,
    );
  }

  private static fileTransport(level: string, logsDirectory: string): DestinationStream {
    mkdirSync(logsDirectory, {recursive: true});

    const ndjsonTarget: TransportTargetOptions = {
      target: 'pino/file',
      level,
      options: {destination: path.join(logsDirectory, 'octarine-adapter.ndjson')},
    };

    const prettyTarget: TransportTargetOptions = {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logsDirectory, 'octarine-adapter.log'),
        translateTime: 'HH:MM:ss.l',
        colorize: false,
        messageKey: 'msg',
        messageFormat: '{msg} [traceId="{traceId}"]',
        ignore: 'pid,hostname,traceId',
        colorizeObjects: false,
        crlf: false,
        hideObject: false,
      },
    };

    return pino.transport({targets: [ndjsonTarget, prettyTarget]});
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    return {...meta, traceId: this.traceId};
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const link of errorChain(error)) {
        console.log(indent + prefix + chalk.yellow(link instanceof Error ? link.message : String(link)));
        if (link instanceof Error && link.stack) {
          const formatted: string = link.stack
            .split('\n')
            .filter((line: string): boolean => !line.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      const message: string = error instanceof Error ? error.message : String(error);
      for (const line of message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
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

  private toPino(level: LogMethod, message: unknown, arguments_: unknown[]): void {
    const meta: Record<string, unknown> = this.prepMeta();

    // Prefer structured errors/objects when provided
    if (message instanceof Error) {
      this.pinoLogger[level]({...meta, err: message}, message.message || 'Error');
      return;
    }

    if (message && typeof message === 'object') {
      const object: Record<string, unknown> = {...meta, ...message};
      if (arguments_.length > 0) {
        this.pinoLogger[level](object, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](object);
      }
      return;
    }

    this.pinoLogger[level](meta, util.format(message, ...arguments_));
  }
}
