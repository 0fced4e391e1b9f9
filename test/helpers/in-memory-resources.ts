// SPDX-License-Identifier: Apache-2.0

import {type Resources} from '../../src/integration/kube/resources/dynamic/resources.js';
import {type ResourceCoordinate} from '../../src/integration/kube/resources/dynamic/resource-coordinate.js';
import {
  documentName,
  type StructuredDocument,
} from '../../src/integration/kube/resources/dynamic/structured-document.js';
import {type DeletionPropagation} from '../../src/integration/kube/resources/dynamic/deletion-propagation.js';
import {ResourceOperation} from '../../src/integration/kube/resources/resource-operation.js';
import {
  ResourceConflictError,
  ResourceNotFoundError,
  ResourceRequestError,
} from '../../src/integration/kube/errors/resource-operation-errors.js';
import {type Optional} from '../../src/types/index.js';

export interface RecordedCall {
  readonly verb: ResourceOperation;
  readonly resourcePlural: string;
  readonly namespace: Optional<string>;
  readonly name: string;
  readonly propagation?: DeletionPropagation;
  readonly document: StructuredDocument;
}

interface FailureRule {
  readonly verb: ResourceOperation;
  readonly resourcePlural: string;
  readonly namespaced: boolean;
  readonly error?: unknown;
}

/**
 * Object store standing in for a cluster. Objects are keyed by resource, namespace scope and name; every call is
 * recorded in order.
 */
export class InMemoryResources implements Resources {
  public readonly calls: RecordedCall[] = [];
  private readonly objects: Map<string, StructuredDocument> = new Map<string, StructuredDocument>();
  private readonly failures: FailureRule[] = [];

  /**
   * Makes every matching call fail. Without an error the call fails with a {@link ResourceRequestError}.
   *
   * @param namespaced - match calls made with a namespace scope (true) or without one (false)
   */
  public failOn(verb: ResourceOperation, resourcePlural: string, namespaced: boolean, error?: unknown): this {
    this.failures.push({verb, resourcePlural, namespaced, error});
    return this;
  }

  public seed(coordinate: ResourceCoordinate, namespace: Optional<string>, document: StructuredDocument): this {
    this.objects.set(this.key(coordinate, namespace, documentName(document)), this.scoped(document, namespace));
    return this;
  }

  public stored(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
  ): Optional<StructuredDocument> {
    return this.objects.get(this.key(coordinate, namespace, name));
  }

  public verbs(): string[] {
    return this.calls.map(
      (call: RecordedCall): string => `${call.verb} ${call.resourcePlural}/${call.name} ${call.namespace ?? '-'}`,
    );
  }

  public async create(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    const name: string = this.record(ResourceOperation.CREATE, coordinate, namespace, document);
    const key: string = this.key(coordinate, namespace, name);
    if (this.objects.has(key)) {
      throw new ResourceConflictError(ResourceOperation.CREATE, coordinate, namespace, name);
    }
    const stored: StructuredDocument = this.scoped(document, namespace);
    this.objects.set(key, stored);
    return structuredClone(stored);
  }

  public async get(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    const name: string = this.record(ResourceOperation.GET, coordinate, namespace, document);
    return structuredClone(this.existing(ResourceOperation.GET, coordinate, namespace, name));
  }

  public async update(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument> {
    const name: string = this.record(ResourceOperation.UPDATE, coordinate, namespace, document);
    this.existing(ResourceOperation.UPDATE, coordinate, namespace, name);
    const stored: StructuredDocument = this.scoped(document, namespace);
    this.objects.set(this.key(coordinate, namespace, name), stored);
    return structuredClone(stored);
  }

  public async delete(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
    propagation: DeletionPropagation,
  ): Promise<void> {
    const name: string = this.record(ResourceOperation.DELETE, coordinate, namespace, document, propagation);
    this.existing(ResourceOperation.DELETE, coordinate, namespace, name);
    this.objects.delete(this.key(coordinate, namespace, name));
  }

  private record(
    verb: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
    propagation?: DeletionPropagation,
  ): string {
    const name: string = documentName(document);
    this.calls.push({
      verb,
      resourcePlural: coordinate.resourcePlural,
      namespace,
      name,
      propagation,
      document: structuredClone(document),
    });

    const rule: Optional<FailureRule> = this.failures.find(
      (candidate: FailureRule): boolean =>
        candidate.verb === verb &&
        candidate.resourcePlural === coordinate.resourcePlural &&
        candidate.namespaced === Boolean(namespace),
    );
    if (rule) {
      throw rule.error ?? new ResourceRequestError(verb, coordinate, namespace, name);
    }
    return name;
  }

  private existing(
    verb: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
  ): StructuredDocument {
    const stored: Optional<StructuredDocument> = this.objects.get(this.key(coordinate, namespace, name));
    if (!stored) {
      throw new ResourceNotFoundError(verb, coordinate, namespace, name);
    }
    return stored;
  }

  private scoped(document: StructuredDocument, namespace: Optional<string>): StructuredDocument {
    const copy: StructuredDocument = structuredClone(document);
    copy.metadata = {...copy.metadata};
    if (namespace) {
      copy.metadata.namespace = namespace;
    } else {
      delete copy.metadata.namespace;
    }
    return copy;
  }

  private key(coordinate: ResourceCoordinate, namespace: Optional<string>, name: string): string {
    return `${coordinate.toString()}|${namespace ?? ''}|${name}`;
  }
}
