// SPDX-License-Identifier: Apache-2.0

import {type OctarineSettings} from '../../src/types/index.js';

export const TEST_SETTINGS: OctarineSettings = {
  account: 'test-account',
  controlPlane: 'control.example.test',
  domain: 'example.test',
  registryServer: 'registry.example.test',
  registryUsername: 'test-user',
  registryPassword: 'test-secret',
};
