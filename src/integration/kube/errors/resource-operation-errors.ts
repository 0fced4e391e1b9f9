// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../../../core/errors/adapter-error.js';
import {type ResourceOperation} from '../resources/resource-operation.js';
import {type ResourceCoordinate} from '../resources/dynamic/resource-coordinate.js';
import {type Optional} from '../../../types/index.js';

function scopeOf(namespace: Optional<string>): string {
  return namespace ? `in namespace '${namespace}'` : 'without namespace';
}

export class ResourceOperationError extends AdapterError {
  public constructor(
    message: string,
    public readonly operation: ResourceOperation,
    public readonly coordinate: ResourceCoordinate,
    public readonly namespace: Optional<string>,
    public readonly resourceName: string,
    cause?: unknown,
  ) {
    super(message, cause, {
      operation,
      resource: coordinate.toString(),
      namespace,
      name: resourceName,
    });
  }
}

export class ResourceNotFoundError extends ResourceOperationError {
  public constructor(
    operation: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
    cause?: unknown,
  ) {
    super(
      `${operation} ${coordinate.resourcePlural} '${name}' ${scopeOf(namespace)}: not found`,
      operation,
      coordinate,
      namespace,
      name,
      cause,
    );
  }
}

export class ResourceConflictError extends ResourceOperationError {
  public constructor(
    operation: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
    cause?: unknown,
  ) {
    super(
      `${operation} ${coordinate.resourcePlural} '${name}' ${scopeOf(namespace)}: already exists or was modified`,
      operation,
      coordinate,
      namespace,
      name,
      cause,
    );
  }
}

export class ResourceRequestError extends ResourceOperationError {
  public constructor(
    operation: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
    cause?: unknown,
  ) {
    super(
      `failed to ${operation} ${coordinate.resourcePlural} '${name}' ${scopeOf(namespace)}`,
      operation,
      coordinate,
      namespace,
      name,
      cause,
    );
  }
}
