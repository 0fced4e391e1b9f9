// SPDX-License-Identifier: Apache-2.0

import {type EventQueue} from './event-queue.js';
import {type MeshEvent} from './mesh-event.js';
import {type EventSink} from './event-sink.js';
import {EventDeliveryError} from './event-delivery-error.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';

/**
 * Drains a session's event queue into a sink until the signal aborts or a delivery fails.
 */
export class EventStreamer {
  public constructor(
    private readonly queue: EventQueue<MeshEvent>,
    private readonly logger: AdapterLogger,
  ) {}

  /**
   * Resolves when `signal` aborts. Rejects with {@link EventDeliveryError} on the first failed send, after putting the
   * event back so a later stream delivers it.
   */
  public async stream(sink: EventSink, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let event: MeshEvent;
      try {
        event = await this.queue.take(signal);
      } catch (error) {
        if (signal.aborted) {
          this.logger.debug('event stream closed');
          return;
        }
        throw error;
      }

      this.logger.debug(`sending event for operation ${event.operationId}`);
      try {
        await sink.send(event);
      } catch (error) {
        this.queue.requeue(event);
        const deliveryError: EventDeliveryError = new EventDeliveryError(event, error);
        this.logger.error(deliveryError);
        throw deliveryError;
      }
    }
  }
}
