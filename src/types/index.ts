// SPDX-License-Identifier: Apache-2.0

// NOTE: DO NOT add any adapter imports in this file to avoid circular dependencies

/**
 * Generic type for representing optional types
 */
export type Optional<T> = T | undefined;

export type Version = string;

/**
 * Settings of the Octarine control plane the dataplane connects to.
 */
export interface OctarineSettings {
  account: string;
  controlPlane: string;
  domain: string;
  registryServer: string;
  registryUsername: string;
  registryPassword: string;
}
