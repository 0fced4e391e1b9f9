// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {AdapterError} from '../../core/errors/adapter-error.js';
import {type ArgvStruct} from '../../types/flag-types.js';
import {Flags as flags} from '../flags.js';
import {APPLY_FLAGS, NO_FLAGS, type MeshCommand} from '../mesh-command.js';

type CommandHandler = (argv: ArgvStruct) => Promise<boolean>;

@injectable()
export class MeshCommandDefinition {
  public static readonly NAME_COMMAND: string = 'name';
  public static readonly OPERATIONS_COMMAND: string = 'operations';
  public static readonly APPLY_COMMAND: string = 'apply';

  private readonly meshCommand: MeshCommand;
  private readonly logger: AdapterLogger;

  public constructor(
    @inject(InjectTokens.MeshCommand) meshCommand?: MeshCommand,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
  ) {
    this.meshCommand = patchInject(meshCommand, InjectTokens.MeshCommand, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  /**
   * Adds the adapter's commands to a root yargs instance.
   */
  public register(root: Argv): Argv {
    return root
      .command(
        MeshCommandDefinition.NAME_COMMAND,
        'Print the name of the mesh this adapter manages',
        (y: Argv) => y.options(flags.options(NO_FLAGS)),
        this.handler(MeshCommandDefinition.NAME_COMMAND, (argv: ArgvStruct): Promise<boolean> =>
          this.meshCommand.name(argv),
        ),
      )
      .command(
        MeshCommandDefinition.OPERATIONS_COMMAND,
        'List the supported operations',
        (y: Argv) => y.options(flags.options(NO_FLAGS)),
        this.handler(MeshCommandDefinition.OPERATIONS_COMMAND, (argv: ArgvStruct): Promise<boolean> =>
          this.meshCommand.operations(argv),
        ),
      )
      .command(
        MeshCommandDefinition.APPLY_COMMAND,
        'Run an operation against the cluster of the selected kubeconfig context',
        (y: Argv) => y.options(flags.options(APPLY_FLAGS)),
        this.handler(MeshCommandDefinition.APPLY_COMMAND, (argv: ArgvStruct): Promise<boolean> =>
          this.meshCommand.apply(argv),
        ),
      );
  }

  private handler(commandName: string, callback: CommandHandler): (argv: ArgvStruct) => Promise<void> {
    return async (argv: ArgvStruct): Promise<void> => {
      this.logger.info(`==== Running '${commandName}' ===`);
      const response: boolean = await callback(argv);
      this.logger.info(`==== Finished running '${commandName}'====`);

      if (!response) {
        throw new AdapterError(`Error running ${commandName}, expected return value to be true`);
      }
    };
  }
}
