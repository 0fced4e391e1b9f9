// SPDX-License-Identifier: Apache-2.0

import {type KubernetesObjectApi, type V1APIResource, type V1ObjectMeta} from '@kubernetes/client-node';
import {type Resources} from '../../../resources/dynamic/resources.js';
import {type ResourceCoordinate} from '../../../resources/dynamic/resource-coordinate.js';
import {documentKind, documentName, type StructuredDocument} from '../../../resources/dynamic/structured-document.js';
import {type DeletionPropagation} from '../../../resources/dynamic/deletion-propagation.js';
import {ResourceOperation} from '../../../resources/resource-operation.js';
import {KubeApiResponse} from '../../../kube-api-response.js';
import {ResourceNotFoundError, ResourceRequestError} from '../../../errors/resource-operation-errors.js';
import {AdapterError} from '../../../../../core/errors/adapter-error.js';
import {type Optional} from '../../../../../types/index.js';

/**
 * Generic object verbs backed by `KubernetesObjectApi`.
 *
 * Every call first looks the kind up through discovery. The coordinate's plural must be the name the API serves the
 * kind under, and a call without a namespace scope only reaches cluster-scoped kinds: a namespaced kind is reported
 * as not found without sending the request.
 */
export class K8ClientResources implements Resources {
  public constructor(private readonly k8sObjectApi: KubernetesObjectApi) {}

  public async create(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    await this.checkScope(ResourceOperation.CREATE, coordinate, namespace, document);
    try {
      return await this.k8sObjectApi.create<StructuredDocument>(this.toSpec(coordinate, namespace, document));
    } catch (error) {
      KubeApiResponse.throwError(error, ResourceOperation.CREATE, coordinate, namespace, documentName(document));
    }
  }

  public async get(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    const name: string = documentName(document);
    await this.checkScope(ResourceOperation.GET, coordinate, namespace, document);
    try {
      return await this.k8sObjectApi.read<StructuredDocument>({
        apiVersion: coordinate.apiVersion,
        kind: document.kind,
        metadata: {name, namespace: namespace ?? ''},
      });
    } catch (error) {
      KubeApiResponse.throwError(error, ResourceOperation.GET, coordinate, namespace, name);
    }
  }

  public async update(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    await this.checkScope(ResourceOperation.UPDATE, coordinate, namespace, document);
    try {
      return await this.k8sObjectApi.replace<StructuredDocument>(this.toSpec(coordinate, namespace, document));
    } catch (error) {
      KubeApiResponse.throwError(error, ResourceOperation.UPDATE, coordinate, namespace, documentName(document));
    }
  }

  public async delete(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
    propagation: DeletionPropagation,
  ): Promise<void> {
    await this.checkScope(ResourceOperation.DELETE, coordinate, namespace, document);
    try {
      await this.k8sObjectApi.delete(
        this.toSpec(coordinate, namespace, document),
        undefined,
        undefined,
        undefined,
        undefined,
        propagation,
      );
    } catch (error) {
      KubeApiResponse.throwError(error, ResourceOperation.DELETE, coordinate, namespace, documentName(document));
    }
  }

  private async checkScope(
    operation: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<void> {
    const name: string = documentName(document);
    const kind: string = documentKind(document);

    let served: Optional<V1APIResource>;
    try {
      served = await this.k8sObjectApi.resource(coordinate.apiVersion, kind);
    } catch (error) {
      KubeApiResponse.throwError(error, operation, coordinate, namespace, name);
    }

    if (!served) {
      const cause: AdapterError = new AdapterError(`kind ${kind} is not served under ${coordinate.apiVersion}`);
      throw new ResourceRequestError(operation, coordinate, namespace, name, cause);
    }

    if (served.name !== coordinate.resourcePlural) {
      const cause: AdapterError = new AdapterError(`kind ${kind} is served as '${served.name}'`);
      throw new ResourceRequestError(operation, coordinate, namespace, name, cause);
    }

    if (!namespace && served.namespaced) {
      throw new ResourceNotFoundError(operation, coordinate, namespace, name);
    }
  }

  private toSpec(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): StructuredDocument {
    const metadata: V1ObjectMeta = {...document.metadata};
    if (namespace) {
      metadata.namespace = namespace;
    } else {
      delete metadata.namespace;
    }

    return {...document, apiVersion: coordinate.apiVersion, metadata};
  }
}
