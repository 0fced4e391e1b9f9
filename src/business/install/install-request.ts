// SPDX-License-Identifier: Apache-2.0

/**
 * A management-plane request to run one operation.
 */
export interface InstallRequest {
  readonly operationId: string;
  readonly operationName: string;
  /** Target namespace; empty means the operation's default. */
  readonly namespace: string;
  readonly username: string;
  /** YAML body, only read by the `custom` operation. */
  readonly customBody: string;
  readonly isDelete: boolean;
}
