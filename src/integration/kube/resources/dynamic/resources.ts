// SPDX-License-Identifier: Apache-2.0

import {type ResourceCoordinate} from './resource-coordinate.js';
import {type StructuredDocument} from './structured-document.js';
import {type DeletionPropagation} from './deletion-propagation.js';
import {type Optional} from '../../../../types/index.js';

/**
 * Generic verbs on any kind of object, addressed by coordinate.
 *
 * A `namespace` of `undefined` issues the call without a namespace scope.
 */
export interface Resources {
  create(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument>;

  get(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument>;

  update(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
  ): Promise<StructuredDocument>;

  delete(
    coordinate: ResourceCoordinate,
    namespace: Optional<string>,
    document: StructuredDocument,
    propagation: DeletionPropagation,
  ): Promise<void>;
}
