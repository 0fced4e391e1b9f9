// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {type ResourceOperation} from './resources/resource-operation.js';
import {type ResourceCoordinate} from './resources/dynamic/resource-coordinate.js';
import {
  ResourceConflictError,
  ResourceNotFoundError,
  ResourceRequestError,
} from './errors/resource-operation-errors.js';
import {type Optional} from '../../types/index.js';

export class KubeApiResponse {
  /**
   * Converts an error returned by a Kubernetes API call into the matching resource operation error.
   *
   * @param errorResponse - the error returned from the Kubernetes API call.
   * @param resourceOperation - the operation being performed on the resource.
   * @param coordinate - the coordinate of the resource being addressed.
   * @param namespace - the namespace scope of the call, if any.
   * @param name - the name of the resource.
   */
  public static throwError(
    errorResponse: unknown,
    resourceOperation: ResourceOperation,
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    name: string,
  ): never {
    if (KubeApiResponse.isNotFound(errorResponse)) {
      throw new ResourceNotFoundError(resourceOperation, coordinate, namespace, name, errorResponse);
    }

    if (KubeApiResponse.isConflict(errorResponse)) {
      throw new ResourceConflictError(resourceOperation, coordinate, namespace, name, errorResponse);
    }

    throw new ResourceRequestError(resourceOperation, coordinate, namespace, name, errorResponse);
  }

  /**
   * The HTTP status carried by an API error, if it has one.
   * @param errorResponse
   */
  public static statusOf(errorResponse: unknown): Optional<number> {
    if (typeof errorResponse !== 'object' || errorResponse === null || !('code' in errorResponse)) {
      return undefined;
    }
    const code: number = Number(errorResponse.code);
    return Number.isNaN(code) ? undefined : code;
  }

  /**
   * Checks if the error response has a status code indicating a "Not Found" error (404).
   * @param errorResponse
   */
  public static isNotFound(errorResponse: unknown): boolean {
    return KubeApiResponse.statusOf(errorResponse) === StatusCodes.NOT_FOUND;
  }

  /**
   * Checks if the error response has a status code indicating a "Conflict" error (409).
   * @param errorResponse
   */
  public static isConflict(errorResponse: unknown): boolean {
    return KubeApiResponse.statusOf(errorResponse) === StatusCodes.CONFLICT;
  }
}
