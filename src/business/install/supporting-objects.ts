// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Base64} from 'js-base64';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {type OctarineSettings} from '../../types/index.js';
import {CONTROL_PLANE_CONFIGMAP_NAME, DOCKER_REGISTRY_SECRET_NAME} from '../../core/constants.js';
import {type StructuredDocument} from '../../integration/kube/resources/dynamic/structured-document.js';
import {DocumentResolver, type ResolvedDocument} from '../manifest/document-resolver.js';
import {type ApplyEngine} from '../manifest/apply-engine.js';
import {ManifestApplier} from '../manifest/manifest-applier.js';

/**
 * The objects the dataplane expects before its manifest is applied: its namespace, the registry pull secret and the
 * control plane connection settings.
 */
@injectable()
export class SupportingObjects {
  private readonly settings: OctarineSettings;
  private readonly logger: AdapterLogger;

  public constructor(
    @inject(InjectTokens.OctarineSettings) settings?: OctarineSettings,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
  ) {
    this.settings = patchInject(settings, InjectTokens.OctarineSettings, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  /**
   * The supporting objects for a namespace, in provisioning order.
   */
  public documents(namespace: string): ResolvedDocument[] {
    return [this.namespace(namespace), this.registrySecret(namespace), this.controlPlaneConfigMap(namespace)].map(
      (document: StructuredDocument): ResolvedDocument => ({
        document,
        coordinate: DocumentResolver.coordinateOf(document),
      }),
    );
  }

  public async provision(engine: ApplyEngine, namespace: string): Promise<void> {
    for (const resolved of this.documents(namespace)) {
      await engine.execute(resolved, false);
    }
    this.logger.info(`provisioned supporting objects in namespace ${namespace}`);
  }

  /**
   * Deletes the supporting objects in reverse order. Objects already gone are skipped.
   */
  public async teardown(engine: ApplyEngine, namespace: string): Promise<void> {
    for (const resolved of this.documents(namespace).reverse()) {
      try {
        await engine.execute(resolved, true);
      } catch (error) {
        if (!ManifestApplier.isAbsent(error)) {
          throw error;
        }
        this.logger.debug(`supporting object ${resolved.coordinate.resourcePlural} already absent`);
      }
    }
    this.logger.info(`removed supporting objects from namespace ${namespace}`);
  }

  private namespace(namespace: string): StructuredDocument {
    return {apiVersion: 'v1', kind: 'Namespace', metadata: {name: namespace}};
  }

  private registrySecret(namespace: string): StructuredDocument {
    const {registryServer, registryUsername, registryPassword} = this.settings;
    const dockerConfig: string = JSON.stringify({
      auths: {
        [registryServer]: {
          username: registryUsername,
          password: registryPassword,
          auth: Base64.encode(`${registryUsername}:${registryPassword}`),
        },
      },
    });

    return {
      apiVersion: 'v1',
      kind: 'Secret',
      type: 'kubernetes.io/dockerconfigjson',
      metadata: {name: DOCKER_REGISTRY_SECRET_NAME, namespace},
      data: {'.dockerconfigjson': Base64.encode(dockerConfig)},
    };
  }

  private controlPlaneConfigMap(namespace: string): StructuredDocument {
    return {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {name: CONTROL_PLANE_CONFIGMAP_NAME, namespace},
      data: {
        account: this.settings.account,
        'control-plane': this.settings.controlPlane,
        domain: this.settings.domain,
      },
    };
  }
}
