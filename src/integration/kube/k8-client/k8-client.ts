// SPDX-License-Identifier: Apache-2.0

import * as k8s from '@kubernetes/client-node';
import {KubeConfig} from '@kubernetes/client-node';
import {AdapterError} from '../../../core/errors/adapter-error.js';
import {type K8} from '../k8.js';
import {type Resources} from '../resources/dynamic/resources.js';
import {K8ClientResources} from './resources/dynamic/k8-client-resources.js';
import {MissingActiveClusterError} from '../errors/missing-active-cluster-error.js';
import {MissingActiveContextError} from '../errors/missing-active-context-error.js';
import {type Optional} from '../../../types/index.js';

/**
 * A kubernetes API wrapper class providing the generic object verbs required by the adapter
 *
 * Note: a client is bound to the kubeconfig it was created with. Create a new client to change clusters.
 */
export class K8Client implements K8 {
  private readonly kubeConfig: k8s.KubeConfig;
  private readonly k8Resources: Resources;

  /**
   * Create a new client for the given kubeconfig and context
   * @param kubeconfig - kubeconfig document as text, if undefined the default kubeconfig is loaded
   * @param context - The context to create the client for, if undefined the current context in kubeconfig is used
   */
  public constructor(kubeconfig: Optional<string>, context: Optional<string>) {
    this.kubeConfig = K8Client.loadKubeConfig(kubeconfig, context);

    if (!this.kubeConfig.getCurrentContext()) {
      throw new MissingActiveContextError();
    }

    if (!this.kubeConfig.getCurrentCluster()) {
      throw new MissingActiveClusterError();
    }

    this.k8Resources = new K8ClientResources(this.kubeConfig.makeApiClient(k8s.KubernetesObjectApi));
  }

  private static loadKubeConfig(kubeconfig: Optional<string>, context: Optional<string>): KubeConfig {
    const kubeConfig: KubeConfig = new KubeConfig();

    if (kubeconfig) {
      try {
        kubeConfig.loadFromString(kubeconfig);
      } catch (error) {
        throw new AdapterError('Failed to load the provided Kubernetes configuration', error);
      }
      K8Client.selectContext(kubeConfig, context);
      return kubeConfig;
    }

    try {
      kubeConfig.loadFromDefault();
      K8Client.selectContext(kubeConfig, context);
    } catch (error) {
      //* Try loading from cluster if loading from default fails
      try {
        kubeConfig.loadFromCluster();
      } catch (fromClusterError) {
        throw new AdapterError('Failed to load Kubernetes configuration from cluster', fromClusterError, {error});
      }
    }

    return kubeConfig;
  }

  private static selectContext(kubeConfig: KubeConfig, context: Optional<string>): void {
    if (!context) {
      return;
    }
    if (!kubeConfig.getContextObject(context)) {
      throw new AdapterError(`No kube config context found with name ${context}`);
    }
    kubeConfig.setCurrentContext(context);
  }

  public resources(): Resources {
    return this.k8Resources;
  }

  public currentContext(): string {
    return this.kubeConfig.getCurrentContext();
  }
}
