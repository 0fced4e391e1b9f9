// SPDX-License-Identifier: Apache-2.0

import {type K8} from './k8.js';
import {type Optional} from '../../types/index.js';

export interface K8Factory {
  /**
   * Create a new cluster connection.
   *
   * @param kubeconfig - the kubeconfig document as text; when absent the default kubeconfig or the in-cluster
   *                     service account is used
   * @param context - the kubeconfig context to select, the kubeconfig's current context when absent
   */
  create(kubeconfig: Optional<string>, context: Optional<string>): K8;
}
