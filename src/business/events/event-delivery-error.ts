// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../../core/errors/adapter-error.js';
import {type MeshEvent} from './mesh-event.js';

export class EventDeliveryError extends AdapterError {
  public constructor(
    public readonly event: MeshEvent,
    cause?: unknown,
  ) {
    super(`error sending event for operation ${event.operationId}`, cause, {
      operationId: event.operationId,
      eventType: event.eventType,
    });
  }
}
