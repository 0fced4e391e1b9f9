// SPDX-License-Identifier: Apache-2.0

import {type Resources} from '../../integration/kube/resources/dynamic/resources.js';
import {type ResourceCoordinate} from '../../integration/kube/resources/dynamic/resource-coordinate.js';
import {
  documentKind,
  documentName,
  isStructuredDocument,
  type StructuredDocument,
} from '../../integration/kube/resources/dynamic/structured-document.js';
import {DeletionPropagation} from '../../integration/kube/resources/dynamic/deletion-propagation.js';
import {AdapterError} from '../../core/errors/adapter-error.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {DEFAULT_KUBERNETES_NAMESPACE} from '../../core/constants.js';
import {type Optional} from '../../types/index.js';
import {type ResolvedDocument} from './document-resolver.js';

/**
 * Reconciles one resolved object against the cluster: create-or-update on apply, scale-down-then-delete on removal.
 *
 * Every verb is tried with the object's namespace first and retried without one, so the same path serves namespaced
 * and cluster-scoped kinds.
 */
export class ApplyEngine {
  private static readonly SCALE_DOWN_BEFORE_DELETE: ReadonlySet<string> = new Set<string>(['deployments']);

  public constructor(
    private readonly resources: Resources,
    private readonly logger: AdapterLogger,
  ) {}

  public async execute(resolved: ResolvedDocument, isDelete: boolean): Promise<void> {
    const {coordinate, document} = resolved;
    if (isDelete) {
      await this.deleteResource(coordinate, document);
      return;
    }

    try {
      await this.createResource(coordinate, document);
    } catch {
      // the create failure is already logged; fall back to read-then-update
      const existing: StructuredDocument = await this.getResource(coordinate, document);
      await this.updateResource(coordinate, existing);
    }
  }

  private async createResource(coordinate: ResourceCoordinate, document: StructuredDocument): Promise<void> {
    const namespace: Optional<string> = document.metadata?.namespace;
    try {
      await this.resources.create(coordinate, namespace, document);
    } catch (error) {
      this.logger.warn(
        new AdapterError('unable to create the requested resource, attempting operation without namespace', error),
      );
      try {
        await this.resources.create(coordinate, undefined, document);
      } catch (clusterScopedError) {
        const wrapped: AdapterError = new AdapterError(
          'unable to create the requested resource, attempting to update',
          clusterScopedError,
        );
        this.logger.error(wrapped);
        throw wrapped;
      }
    }
    this.logger.info(`Created Resource of type: ${documentKind(document)} and name: ${documentName(document)}`);
  }

  private async getResource(
    coordinate: ResourceCoordinate,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    const namespace: Optional<string> = document.metadata?.namespace;
    try {
      return await this.resources.get(coordinate, namespace, document);
    } catch (error) {
      this.logger.warn(
        new AdapterError('unable to retrieve the resource, attempting operation without namespace', error),
      );
      try {
        return await this.resources.get(coordinate, undefined, document);
      } catch (clusterScopedError) {
        const wrapped: AdapterError = new AdapterError('unable to retrieve the resource', clusterScopedError);
        this.logger.error(wrapped);
        throw wrapped;
      }
    }
  }

  private async updateResource(coordinate: ResourceCoordinate, document: StructuredDocument): Promise<void> {
    const namespace: Optional<string> = document.metadata?.namespace;
    try {
      await this.resources.update(coordinate, namespace, document);
    } catch (error) {
      this.logger.warn(
        new AdapterError('unable to update the resource, attempting operation without namespace', error),
      );
      try {
        await this.resources.update(coordinate, undefined, document);
      } catch (clusterScopedError) {
        const wrapped: AdapterError = new AdapterError('unable to update the resource', clusterScopedError);
        this.logger.error(wrapped);
        throw wrapped;
      }
    }
    this.logger.info(`Updated Resource of type: ${documentKind(document)} and name: ${documentName(document)}`);
  }

  private async deleteResource(coordinate: ResourceCoordinate, document: StructuredDocument): Promise<void> {
    const name: string = documentName(document);
    if (coordinate.resourcePlural === 'namespaces' && name === DEFAULT_KUBERNETES_NAMESPACE) {
      this.logger.debug('skipping removal of the default namespace');
      return;
    }

    if (ApplyEngine.SCALE_DOWN_BEFORE_DELETE.has(coordinate.resourcePlural)) {
      const current: StructuredDocument = await this.getResource(coordinate, document);
      ApplyEngine.scaleToZero(current);
      await this.updateResource(coordinate, current);
    }

    const namespace: Optional<string> = document.metadata?.namespace;
    try {
      await this.resources.delete(coordinate, namespace, document, DeletionPropagation.BACKGROUND);
    } catch (error) {
      this.logger.warn(
        new AdapterError('unable to delete the resource, attempting operation without namespace', error),
      );
      try {
        await this.resources.delete(coordinate, undefined, document, DeletionPropagation.BACKGROUND);
      } catch (clusterScopedError) {
        const wrapped: AdapterError = new AdapterError('unable to delete the resource', clusterScopedError);
        this.logger.error(wrapped);
        throw wrapped;
      }
    }
    this.logger.info(`Deleted Resource of type: ${documentKind(document)} and name: ${name}`);
  }

  private static scaleToZero(document: StructuredDocument): void {
    const spec: unknown = document.spec;
    if (isStructuredDocument(spec)) {
      spec.replicas = 0;
    } else {
      document.spec = {replicas: 0};
    }
  }
}
