// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../../core/errors/adapter-error.js';

export class VetFailedError extends AdapterError {
  public constructor(public readonly failures: readonly string[]) {
    super(`${failures.length} check(s) failed: ${failures.join('; ')}`, undefined, {failures});
  }
}
