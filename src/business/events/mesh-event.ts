// SPDX-License-Identifier: Apache-2.0

export enum EventType {
  INFO = 'INFO',
  ERROR = 'ERROR',
}

/**
 * Outcome notification of one operation, delivered to the management plane.
 */
export interface MeshEvent {
  readonly operationId: string;
  readonly eventType: EventType;
  readonly summary: string;
  readonly details: string;
}

export function infoEvent(operationId: string, summary: string, details: string): MeshEvent {
  return {operationId, eventType: EventType.INFO, summary, details};
}

export function errorEvent(operationId: string, summary: string, details: string): MeshEvent {
  return {operationId, eventType: EventType.ERROR, summary, details};
}
