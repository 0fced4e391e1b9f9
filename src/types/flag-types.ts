// SPDX-License-Identifier: Apache-2.0

import {type Options} from 'yargs';

export interface CommandFlag {
  readonly constName: string;
  readonly name: string;
  readonly definition: Options;
}

export interface CommandFlags {
  readonly required: CommandFlag[];
  readonly optional: CommandFlag[];
}

export type ArgvStruct = Record<string, unknown>;
