// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * Ends a run early without it counting as a failure.
 */
export class UserBreak extends AdapterError {
  public constructor(message: string) {
    super(message);
  }
}
