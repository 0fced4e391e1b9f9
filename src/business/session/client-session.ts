// SPDX-License-Identifier: Apache-2.0

import {v4 as uuidv4} from 'uuid';
import {type K8} from '../../integration/kube/k8.js';
import {EventQueue} from '../events/event-queue.js';
import {type MeshEvent} from '../events/mesh-event.js';
import {WorkflowTasks} from './workflow-task.js';
import {DEFAULT_DATAPLANE_NAMESPACE} from '../../core/constants.js';

/**
 * One connection to a cluster together with its event queue and running workflows.
 *
 * Sessions are immutable. Recording a dataplane namespace yields a new session sharing the connection, queue and task
 * registry, so workflows keep the session value they were started with.
 */
export class ClientSession {
  private constructor(
    public readonly id: string,
    public readonly k8: K8,
    public readonly events: EventQueue<MeshEvent>,
    public readonly dataplaneNamespace: string,
    public readonly tasks: WorkflowTasks,
  ) {
    Object.freeze(this);
  }

  public static create(k8: K8, eventQueueCapacity: number): ClientSession {
    return new ClientSession(
      uuidv4(),
      k8,
      new EventQueue<MeshEvent>(eventQueueCapacity),
      DEFAULT_DATAPLANE_NAMESPACE,
      new WorkflowTasks(),
    );
  }

  public withDataplaneNamespace(namespace: string): ClientSession {
    if (namespace === this.dataplaneNamespace) {
      return this;
    }
    return new ClientSession(this.id, this.k8, this.events, namespace, this.tasks);
  }
}
