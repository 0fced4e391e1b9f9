// SPDX-License-Identifier: Apache-2.0

import {type MeshEvent} from './mesh-event.js';

/**
 * Receiving end of the event stream, typically a management-plane connection.
 */
export interface EventSink {
  send(event: MeshEvent): Promise<void>;
}
