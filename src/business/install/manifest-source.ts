// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type TemplateRenderer} from '../../core/template-renderer.js';
import {AdapterError} from '../../core/errors/adapter-error.js';
import {DATAPLANE_MANIFEST_FILE, DEMO_APP_MANIFEST_FILE} from '../../core/constants.js';
import {type OctarineSettings} from '../../types/index.js';

/**
 * Supplies the manifests the background operations apply.
 */
export interface ManifestSource {
  /** The dataplane manifest generated for a namespace. */
  dataplaneManifest(namespace: string): Promise<string>;

  /** The demo application manifest. */
  demoManifest(): Promise<string>;
}

/**
 * Reads manifests from the bundled `resources/manifests` directory.
 */
@injectable()
export class FileManifestSource implements ManifestSource {
  private readonly templateRenderer: TemplateRenderer;
  private readonly manifestsDirectory: string;
  private readonly settings: OctarineSettings;

  public constructor(
    @inject(InjectTokens.TemplateRenderer) templateRenderer?: TemplateRenderer,
    @inject(InjectTokens.ManifestsDirectory) manifestsDirectory?: string,
    @inject(InjectTokens.OctarineSettings) settings?: OctarineSettings,
  ) {
    this.templateRenderer = patchInject(templateRenderer, InjectTokens.TemplateRenderer, this.constructor.name);
    this.manifestsDirectory = patchInject(manifestsDirectory, InjectTokens.ManifestsDirectory, this.constructor.name);
    this.settings = patchInject(settings, InjectTokens.OctarineSettings, this.constructor.name);
  }

  public async dataplaneManifest(namespace: string): Promise<string> {
    return this.templateRenderer.renderFile(
      DATAPLANE_MANIFEST_FILE,
      {
        namespace,
        account: this.settings.account,
        control_plane: this.settings.controlPlane,
        domain: this.settings.domain,
      },
      this.manifestsDirectory,
    );
  }

  public async demoManifest(): Promise<string> {
    const file: string = path.join(this.manifestsDirectory, DEMO_APP_MANIFEST_FILE);
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error) {
      throw new AdapterError('unable to read the demo application manifest', error, {file});
    }
  }
}
