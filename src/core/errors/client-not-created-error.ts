// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

export class ClientNotCreatedError extends AdapterError {
  public static readonly CLIENT_NOT_CREATED: string = 'mesh client has not been created';

  public constructor() {
    super(ClientNotCreatedError.CLIENT_NOT_CREATED);
  }
}
