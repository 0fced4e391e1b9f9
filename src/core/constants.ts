// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import url from 'node:url';
import 'dotenv/config';
import {type OctarineSettings} from '../types/index.js';

export function getEnvironmentVariable(name: string): string | undefined {
  if (process.env[name]) {
    return process.env[name];
  }
  return undefined;
}

const MODULE_ROOT: string = path.resolve(path.dirname(url.fileURLToPath(import.meta.url)), '..', '..');
// compiled output lives under dist/, the bundled resources beside it
export const ROOT_DIR: string = path.basename(MODULE_ROOT) === 'dist' ? path.dirname(MODULE_ROOT) : MODULE_ROOT;

// -------------------- adapter related constants ------------------------------------------------------------------
export const ADAPTER_HOME_DIR: string =
  getEnvironmentVariable('OCTARINE_ADAPTER_HOME') ||
  path.join(process.env.HOME || process.env.USERPROFILE || '.', '.octarine-adapter');
export const ADAPTER_LOGS_DIR: string = path.join(ADAPTER_HOME_DIR, 'logs');
export const ADAPTER_LOG_LEVEL: string = getEnvironmentVariable('OCTARINE_ADAPTER_LOG_LEVEL') || 'info';
export const ADAPTER_DEV_OUTPUT: boolean = Boolean(getEnvironmentVariable('OCTARINE_ADAPTER_DEV_OUTPUT')) || false;
export const RESOURCES_DIR: string = path.join(ROOT_DIR, 'resources');
export const TEMPLATES_DIR: string = path.join(RESOURCES_DIR, 'templates');
export const MANIFESTS_DIR: string = path.join(RESOURCES_DIR, 'manifests');

export const MESH_NAME: string = 'Octarine';
export const EVENT_QUEUE_CAPACITY: number =
  Number(getEnvironmentVariable('OCTARINE_EVENT_QUEUE_CAPACITY') ?? '') || 100;

// --------------- cluster objects ---------------------------------------------------------------------------------
export const DEFAULT_DATAPLANE_NAMESPACE: string = 'octarine-dataplane';
export const DEFAULT_KUBERNETES_NAMESPACE: string = 'default';
export const INJECTION_LABEL_KEY: string = 'octarine-injection';
export const INJECTION_LABEL_VALUE: string = 'enabled';
export const DOCKER_REGISTRY_SECRET_NAME: string = 'docker-registry-secret';
export const CONTROL_PLANE_CONFIGMAP_NAME: string = 'octarine-control-plane';
export const DATAPLANE_MANIFEST_FILE: string = 'octarine-dataplane.yaml';
export const DEMO_APP_MANIFEST_FILE: string = 'book-info.yaml';

// --------------- control plane -----------------------------------------------------------------------------------
export const OCTARINE_SETTINGS: OctarineSettings = {
  account: getEnvironmentVariable('OCTARINE_ACCOUNT') || '',
  controlPlane: getEnvironmentVariable('OCTARINE_CONTROL_PLANE') || '',
  domain: getEnvironmentVariable('OCTARINE_DOMAIN') || '',
  registryServer: getEnvironmentVariable('OCTARINE_REGISTRY_SERVER') || 'docker.io',
  registryUsername: getEnvironmentVariable('OCTARINE_REGISTRY_USERNAME') || '',
  registryPassword: getEnvironmentVariable('OCTARINE_REGISTRY_PASSWORD') || '',
};
