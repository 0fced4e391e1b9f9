// SPDX-License-Identifier: Apache-2.0

import {type Options} from 'yargs';
import {type ArgvStruct, type CommandFlag, type CommandFlags} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type Optional} from '../types/index.js';

export class Flags {
  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Show full error chains with stack traces',
      default: false,
      type: 'boolean',
    },
  };

  public static readonly operation: CommandFlag = {
    constName: 'operation',
    name: 'operation',
    definition: {
      describe: 'Name of the operation to run, see the operations command',
      alias: 'o',
      type: 'string',
    },
  };

  public static readonly namespace: CommandFlag = {
    constName: 'namespace',
    name: 'namespace',
    definition: {
      describe: 'Target namespace; each operation falls back to its own default when empty',
      alias: 'n',
      default: '',
      type: 'string',
    },
  };

  public static readonly username: CommandFlag = {
    constName: 'username',
    name: 'username',
    definition: {
      describe: 'User on whose behalf templated operations are rendered',
      default: '',
      type: 'string',
    },
  };

  public static readonly deleteOperation: CommandFlag = {
    constName: 'deleteOperation',
    name: 'delete',
    definition: {
      describe: 'Remove what the operation would otherwise install',
      default: false,
      type: 'boolean',
    },
  };

  public static readonly customBodyFile: CommandFlag = {
    constName: 'customBodyFile',
    name: 'custom-body-file',
    definition: {
      describe: 'YAML file holding the body of the custom operation',
      type: 'string',
    },
  };

  public static readonly kubeconfig: CommandFlag = {
    constName: 'kubeconfig',
    name: 'kubeconfig',
    definition: {
      describe: 'Kubeconfig file; the default kubeconfig, then the in-cluster account, when absent',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    constName: 'contextName',
    name: 'context',
    definition: {
      describe: 'Kubeconfig context to use instead of the current one',
      type: 'string',
    },
  };

  /**
   * Yargs option definitions of a command's flags. Required flags are demanded.
   */
  public static options(flags: CommandFlags): Record<string, Options> {
    const options: Record<string, Options> = {};
    for (const flag of flags.required) {
      options[flag.name] = Flags.toOption(flag, true);
    }
    for (const flag of flags.optional) {
      options[flag.name] = Flags.toOption(flag, false);
    }
    return options;
  }

  private static toOption(flag: CommandFlag, required: boolean): Options {
    return {...flag.definition, demandOption: required};
  }

  public static stringValue(argv: ArgvStruct, flag: CommandFlag): Optional<string> {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`flag --${flag.name} expects a string`, value);
    }
    return value;
  }

  public static booleanValue(argv: ArgvStruct, flag: CommandFlag): boolean {
    return argv[flag.name] === true;
  }
}
