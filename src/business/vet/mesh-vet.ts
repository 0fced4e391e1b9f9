// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {formatErrorChain} from '../../core/errors/error-chain.js';
import {type ClientSession} from '../session/client-session.js';
import {type SupportingObjects} from '../install/supporting-objects.js';
import {type Resources} from '../../integration/kube/resources/dynamic/resources.js';
import {documentKind, documentName} from '../../integration/kube/resources/dynamic/structured-document.js';
import {VetFailedError} from './vet-failed-error.js';

/**
 * Checks that the supporting objects of the session's dataplane namespace are readable.
 */
@injectable()
export class MeshVet {
  private readonly supportingObjects: SupportingObjects;
  private readonly logger: AdapterLogger;

  public constructor(
    @inject(InjectTokens.SupportingObjects) supportingObjects?: SupportingObjects,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
  ) {
    this.supportingObjects = patchInject(supportingObjects, InjectTokens.SupportingObjects, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  /**
   * @throws VetFailedError - listing every failed check
   */
  public async run(session: ClientSession, signal: AbortSignal): Promise<void> {
    const resources: Resources = session.k8.resources();
    const failures: string[] = [];

    for (const {document, coordinate} of this.supportingObjects.documents(session.dataplaneNamespace)) {
      signal.throwIfAborted();
      const label: string = `${documentKind(document)} '${documentName(document)}'`;
      try {
        await resources.get(coordinate, document.metadata?.namespace, document);
        this.logger.debug(`vet: ${label} present`);
      } catch (error) {
        failures.push(`${label}: ${formatErrorChain(error)}`);
      }
    }

    if (failures.length > 0) {
      throw new VetFailedError(failures);
    }
  }
}
