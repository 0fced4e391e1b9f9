// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type AdapterLogger} from './logging/adapter-logger.js';
import {errorChain} from './errors/error-chain.js';
import {UserBreak} from './errors/user-break.js';

/**
 * Reports the error that ended a command line run and sets the process exit code.
 */
@injectable()
export class ErrorHandler {
  private readonly logger: AdapterLogger;

  public constructor(@inject(InjectTokens.AdapterLogger) logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak: unknown = errorChain(error).find((link: unknown): boolean => link instanceof UserBreak);
    if (userBreak instanceof UserBreak) {
      this.logger.info(userBreak.message);
      process.exitCode = 0;
      return;
    }

    this.logger.showUserError(error);
    process.exitCode = 1;
  }
}
