// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {type EventSink} from '../business/events/event-sink.js';
import {EventType, type MeshEvent} from '../business/events/mesh-event.js';
import {type AdapterLogger} from '../core/logging/adapter-logger.js';

/**
 * Prints events to the terminal and aborts the stream once the awaited operation has reported.
 */
export class ConsoleEventSink implements EventSink {
  private readonly received: MeshEvent[] = [];

  public constructor(
    private readonly logger: AdapterLogger,
    private readonly operationId: string,
    private readonly streamController: AbortController,
  ) {}

  public async send(event: MeshEvent): Promise<void> {
    this.received.push(event);
    const colour: (text: string) => string = event.eventType === EventType.ERROR ? chalk.red : chalk.green;
    this.logger.showUser(colour(`[${event.eventType}] ${event.summary}`));
    if (event.details) {
      this.logger.showUser(chalk.gray(event.details));
    }

    if (event.operationId === this.operationId) {
      this.streamController.abort();
    }
  }

  public get events(): readonly MeshEvent[] {
    return this.received;
  }
}
