// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {AdapterError} from '../errors/adapter-error.js';

/**
 * Resolves a constructor parameter from the container when the caller did not pass it explicitly.
 *
 * @param parameter - the value passed to the constructor, if any
 * @param token - the injection token to resolve when the parameter is absent
 * @param callingClassName - the class asking, used in the error message
 */
export function patchInject<T>(parameter: T | null | undefined, token: symbol, callingClassName: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }

  if (!container.isRegistered(token, true)) {
    throw new AdapterError(`${String(token.description)} is not registered, required by ${callingClassName}`);
  }

  return container.resolve<T>(token);
}
