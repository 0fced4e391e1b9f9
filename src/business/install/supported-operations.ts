// SPDX-License-Identifier: Apache-2.0

import {type Optional} from '../../types/index.js';

export enum OperationKind {
  INSTALL = 'install',
  DEMO_APP = 'demo-app',
  VET = 'vet',
  CUSTOM = 'custom',
  TEMPLATED = 'templated',
}

export interface OperationDescriptor {
  readonly key: string;
  readonly displayName: string;
  readonly kind: OperationKind;
}

export const INSTALL_OPERATION: string = 'install';
export const INSTALL_DEMO_APP_OPERATION: string = 'install_book_info';
export const VET_OPERATION: string = 'run_vet';
export const CUSTOM_OPERATION: string = 'custom';

/**
 * Operations the adapter accepts, keyed by their wire name.
 */
export class SupportedOperations {
  private static readonly OPERATIONS: readonly OperationDescriptor[] = [
    {key: INSTALL_OPERATION, displayName: 'Install Octarine', kind: OperationKind.INSTALL},
    {
      key: INSTALL_DEMO_APP_OPERATION,
      displayName: 'Install the canonical Book Info Application',
      kind: OperationKind.DEMO_APP,
    },
    {key: VET_OPERATION, displayName: 'Run vet', kind: OperationKind.VET},
    {key: CUSTOM_OPERATION, displayName: 'Custom YAML', kind: OperationKind.CUSTOM},
    {key: 'deny_all_traffic', displayName: 'Deny all traffic in the namespace', kind: OperationKind.TEMPLATED},
    {
      key: 'allow_demo_traffic',
      displayName: 'Allow traffic between the Book Info services',
      kind: OperationKind.TEMPLATED,
    },
  ];

  public static find(operationName: string): Optional<OperationDescriptor> {
    return SupportedOperations.OPERATIONS.find(
      (descriptor: OperationDescriptor): boolean => descriptor.key === operationName,
    );
  }

  public static listing(): Record<string, string> {
    const listing: Record<string, string> = {};
    for (const descriptor of SupportedOperations.OPERATIONS) {
      listing[descriptor.key] = descriptor.displayName;
    }
    return listing;
  }

  public static keys(): string[] {
    return SupportedOperations.OPERATIONS.map((descriptor: OperationDescriptor): string => descriptor.key);
  }
}
