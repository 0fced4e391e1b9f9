// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * Raised when a caller asks for an operation the adapter does not know, or for a code path that must not be used.
 */
export class UnsupportedOperationError extends AdapterError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
