// SPDX-License-Identifier: Apache-2.0

const MAX_CAUSE_DEPTH: number = 10;

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Walks an error and its `cause` links, outermost first.
 */
export function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

/**
 * Renders `outer: inner: root` from the cause chain, skipping empty messages.
 */
export function formatErrorChain(error: unknown): string {
  return errorChain(error)
    .map((link: unknown): string => messageOf(link).trim())
    .filter((message: string): boolean => message.length > 0)
    .join(': ');
}
