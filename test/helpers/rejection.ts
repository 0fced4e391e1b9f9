// SPDX-License-Identifier: Apache-2.0

/**
 * Awaits a promise that must reject and returns the rejection reason.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}
