// SPDX-License-Identifier: Apache-2.0

import {ManifestSplitter} from './manifest-splitter.js';
import {DocumentResolver, type ResolvedDocument} from './document-resolver.js';
import {type ApplyEngine} from './apply-engine.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {errorChain} from '../../core/errors/error-chain.js';
import {ResourceNotFoundError} from '../../integration/kube/errors/resource-operation-errors.js';

/**
 * Walks a multi-document manifest and hands every resolved object to the apply engine, in source order.
 */
export class ManifestApplier {
  private static readonly ABSENCE_MESSAGES: readonly string[] = [
    'not found',
    'the server could not find the requested resource',
  ];

  public constructor(
    private readonly engine: ApplyEngine,
    private readonly logger: AdapterLogger,
  ) {}

  /**
   * Stops at the first failing segment. During removal a segment whose object is already gone counts as done.
   */
  public async apply(manifest: string, namespace: string, isDelete: boolean): Promise<void> {
    for (const segment of ManifestSplitter.split(manifest)) {
      try {
        await this.applySegment(segment, namespace, isDelete);
      } catch (error) {
        if (isDelete && ManifestApplier.isAbsent(error)) {
          this.logger.debug('resource already absent, continuing removal', error);
          continue;
        }
        throw error;
      }
    }
  }

  private async applySegment(segment: string, namespace: string, isDelete: boolean): Promise<void> {
    const resolved: ResolvedDocument[] = DocumentResolver.resolve(segment, namespace);
    for (const item of resolved) {
      await this.engine.execute(item, isDelete);
    }
  }

  /**
   * True when any link of the error chain reports a missing object.
   */
  public static isAbsent(error: unknown): boolean {
    return errorChain(error).some((link: unknown): boolean => {
      if (link instanceof ResourceNotFoundError) {
        return true;
      }
      const message: string = (link instanceof Error ? link.message : String(link)).trim().toLowerCase();
      return ManifestApplier.ABSENCE_MESSAGES.some((suffix: string): boolean => message.endsWith(suffix));
    });
  }
}
