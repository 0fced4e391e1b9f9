// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../../core/errors/adapter-error.js';

export class DocumentDecodeError extends AdapterError {
  public static readonly YAML_TO_JSON: string = 'unable to convert yaml to json';
  public static readonly NOT_AN_OBJECT: string = 'unable to unmarshal json created from yaml';

  public constructor(message: string, cause?: unknown, meta: object = {}) {
    super(message, cause, meta);
  }
}
