// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import yargs, {type Argv} from 'yargs';
import {hideBin} from 'yargs/helpers';
import {AdapterError} from './core/errors/adapter-error.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type AdapterLogger} from './core/logging/adapter-logger.js';
import {type MeshCommandDefinition} from './commands/command-definitions/mesh-command-definition.js';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<void> {
    const logger: AdapterLogger = container.resolve<AdapterLogger>(InjectTokens.AdapterLogger);
    const definition: MeshCommandDefinition = container.resolve<MeshCommandDefinition>(
      InjectTokens.MeshCommandDefinition,
    );

    logger.debug('Initializing commands');
    const root: Argv = yargs(hideBin(argv))
      .scriptName('octarine-adapter')
      .usage('Usage:\n  octarine-adapter <command> [options]');
    const rootCmd: Argv = definition
      .register(root)
      .alias('h', 'help')
      .strict()
      .demandCommand(1, 'Select a command');

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string, error: Error): void => {
      if (error) {
        throw error;
      }

      logger.showUser(message);
      // Set exit code but don't exit immediately - allows I/O buffers to flush
      process.exitCode = 1;
      throw new AdapterError(message);
    });

    logger.debug('Parsing root command (executing the commands)');
    await rootCmd.parseAsync();
  }
}
