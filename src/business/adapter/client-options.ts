// SPDX-License-Identifier: Apache-2.0

export interface ClientOptions {
  /** Kubeconfig document as text. The default kubeconfig, then the in-cluster account, when absent. */
  readonly kubeconfig?: string;
  /** Context to select instead of the kubeconfig's current context. */
  readonly contextName?: string;
}
