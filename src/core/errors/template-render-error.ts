// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

export class TemplateRenderError extends AdapterError {
  public constructor(
    message: string,
    public readonly templateName: string,
    cause?: unknown,
  ) {
    super(message, cause, {templateName});
  }
}
