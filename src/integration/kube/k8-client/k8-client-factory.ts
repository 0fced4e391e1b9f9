// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type K8Factory} from '../k8-factory.js';
import {type K8} from '../k8.js';
import {K8Client} from './k8-client.js';
import {type Optional} from '../../../types/index.js';

/**
 * Creates a new, uncached connection on every call, since a session is replaced wholesale whenever a client is
 * created.
 */
@injectable()
export class K8ClientFactory implements K8Factory {
  public create(kubeconfig: Optional<string>, context: Optional<string>): K8 {
    return new K8Client(kubeconfig, context);
  }
}
