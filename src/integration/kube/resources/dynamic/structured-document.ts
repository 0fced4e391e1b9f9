// SPDX-License-Identifier: Apache-2.0

import {type KubernetesObject} from '@kubernetes/client-node';

/**
 * An untyped Kubernetes object as decoded from one YAML document.
 */
export interface StructuredDocument extends KubernetesObject {
  [key: string]: unknown;
}

export function isStructuredDocument(value: unknown): value is StructuredDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function documentName(document: StructuredDocument): string {
  return document.metadata?.name ?? '';
}

export function documentKind(document: StructuredDocument): string {
  return document.kind ?? '';
}
