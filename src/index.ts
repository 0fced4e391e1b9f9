// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {type AdapterLogger} from './core/logging/adapter-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {AdapterError} from './core/errors/adapter-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {MESH_NAME} from './core/constants.js';
import {getAdapterVersion} from '../version.js';
import {ArgumentProcessor} from './argument-processor.js';

export async function main(argv: string[], context?: {logger?: AdapterLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`, error);
    throw new AdapterError('Error initializing container', error);
  }

  const logger: AdapterLogger = container.resolve<AdapterLogger>(InjectTokens.AdapterLogger);

  if (context) {
    // save the logger so that adapter.ts can use it to report how the run ended
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(new AdapterError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new AdapterError(`Uncaught Exception, origin: ${origin}`, error));
  });

  logger.debug(`Initializing ${MESH_NAME} adapter CLI`);
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n*************************** Octarine Adapter *************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getAdapterVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  return ArgumentProcessor.process(argv);
}
