// SPDX-License-Identifier: Apache-2.0

import {type Resources} from './resources/dynamic/resources.js';

/**
 * A Kubernetes cluster connection.
 */
export interface K8 {
  /**
   * Generic object verbs, addressed by group, version and resource.
   */
  resources(): Resources;

  /**
   * The name of the kubeconfig context this connection was created for.
   */
  currentContext(): string;
}
