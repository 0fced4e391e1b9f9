// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';
import {type Version} from './src/types/index.js';
import {ROOT_DIR} from './src/core/constants.js';

/**
 * The version of the adapter, taken from npm when run through a script, otherwise from its package.json.
 */
export function getAdapterVersion(): Version {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const packageJsonPath: string = path.join(ROOT_DIR, 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
