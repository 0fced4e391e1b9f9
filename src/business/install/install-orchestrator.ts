// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type V1ObjectMeta} from '@kubernetes/client-node';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {type TemplateRenderer} from '../../core/template-renderer.js';
import {AdapterError} from '../../core/errors/adapter-error.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {formatErrorChain} from '../../core/errors/error-chain.js';
import {
  DEFAULT_DATAPLANE_NAMESPACE,
  DOCKER_REGISTRY_SECRET_NAME,
  INJECTION_LABEL_KEY,
  INJECTION_LABEL_VALUE,
} from '../../core/constants.js';
import {type Resources} from '../../integration/kube/resources/dynamic/resources.js';
import {ResourceCoordinate} from '../../integration/kube/resources/dynamic/resource-coordinate.js';
import {type StructuredDocument} from '../../integration/kube/resources/dynamic/structured-document.js';
import {ApplyEngine} from '../manifest/apply-engine.js';
import {ManifestApplier} from '../manifest/manifest-applier.js';
import {type ClientSession} from '../session/client-session.js';
import {type WorkflowTask} from '../session/workflow-task.js';
import {errorEvent, infoEvent, type MeshEvent} from '../events/mesh-event.js';
import {type MeshVet} from '../vet/mesh-vet.js';
import {type ManifestSource} from './manifest-source.js';
import {type SupportingObjects} from './supporting-objects.js';
import {type InstallRequest} from './install-request.js';
import {OperationKind, SupportedOperations, type OperationDescriptor} from './supported-operations.js';
import {DEMO_APP_MESSAGES, INSTALL_MESSAGES, VET_MESSAGES, type WorkflowMessages} from './workflow-messages.js';
import {type Optional} from '../../types/index.js';

/**
 * What a dispatched operation leaves behind: the session to keep using and, for background operations, the task.
 */
export interface OperationDispatch {
  readonly session: ClientSession;
  readonly task: Optional<WorkflowTask>;
}

type WorkflowStep = (signal: AbortSignal) => Promise<void>;

const NAMESPACES: ResourceCoordinate = ResourceCoordinate.of('', 'v1', 'namespaces');
const SECRETS: ResourceCoordinate = ResourceCoordinate.of('', 'v1', 'secrets');

/**
 * Routes operation requests. `custom` and templated operations run before the call returns; installs, the demo
 * application and vet run as background workflows that report through the session's event queue.
 */
@injectable()
export class InstallOrchestrator {
  private readonly logger: AdapterLogger;
  private readonly templateRenderer: TemplateRenderer;
  private readonly manifestSource: ManifestSource;
  private readonly supportingObjects: SupportingObjects;
  private readonly meshVet: MeshVet;

  public constructor(
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
    @inject(InjectTokens.TemplateRenderer) templateRenderer?: TemplateRenderer,
    @inject(InjectTokens.ManifestSource) manifestSource?: ManifestSource,
    @inject(InjectTokens.SupportingObjects) supportingObjects?: SupportingObjects,
    @inject(InjectTokens.MeshVet) meshVet?: MeshVet,
  ) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
    this.templateRenderer = patchInject(templateRenderer, InjectTokens.TemplateRenderer, this.constructor.name);
    this.manifestSource = patchInject(manifestSource, InjectTokens.ManifestSource, this.constructor.name);
    this.supportingObjects = patchInject(supportingObjects, InjectTokens.SupportingObjects, this.constructor.name);
    this.meshVet = patchInject(meshVet, InjectTokens.MeshVet, this.constructor.name);
  }

  /**
   * Rejects requests that can never succeed, before anything touches the cluster.
   *
   * @throws UnsupportedOperationError - unknown operation name
   * @throws MissingArgumentError - `custom` without a body
   */
  public static validate(request: InstallRequest): OperationDescriptor {
    const descriptor: Optional<OperationDescriptor> = SupportedOperations.find(request.operationName);
    if (!descriptor) {
      throw new UnsupportedOperationError(`operation '${request.operationName}' is not supported`, undefined, {
        operationName: request.operationName,
      });
    }

    if (descriptor.kind === OperationKind.CUSTOM && request.customBody.trim().length === 0) {
      throw new MissingArgumentError('the custom operation requires a non-empty YAML body');
    }

    return descriptor;
  }

  public async dispatch(session: ClientSession, request: InstallRequest): Promise<OperationDispatch> {
    const descriptor: OperationDescriptor = InstallOrchestrator.validate(request);
    this.logger.info(
      `operation ${descriptor.key} requested (id: ${request.operationId}, delete: ${request.isDelete}, ` +
        `namespace: '${request.namespace}')`,
    );

    switch (descriptor.kind) {
      case OperationKind.CUSTOM: {
        await this.applier(session).apply(request.customBody, request.namespace, request.isDelete);
        return {session, task: undefined};
      }
      case OperationKind.TEMPLATED: {
        const manifest: string = await this.templateRenderer.renderFile(`${descriptor.key}.yaml`, {
          user_name: request.username,
          namespace: request.namespace,
        });
        await this.applier(session).apply(manifest, request.namespace, request.isDelete);
        return {session, task: undefined};
      }
      case OperationKind.INSTALL: {
        const namespace: string = request.namespace || DEFAULT_DATAPLANE_NAMESPACE;
        const task: WorkflowTask = this.schedule(
          session,
          request,
          INSTALL_MESSAGES,
          (signal: AbortSignal): Promise<void> => this.installMesh(session, namespace, request.isDelete, signal),
        );
        return {session: session.withDataplaneNamespace(namespace), task};
      }
      case OperationKind.DEMO_APP: {
        const task: WorkflowTask = this.schedule(
          session,
          request,
          DEMO_APP_MESSAGES,
          (signal: AbortSignal): Promise<void> =>
            this.installDemoApp(session, request.namespace, request.isDelete, signal),
        );
        return {session, task};
      }
      case OperationKind.VET: {
        const task: WorkflowTask = this.schedule(
          session,
          request,
          VET_MESSAGES,
          (signal: AbortSignal): Promise<void> => this.meshVet.run(session, signal),
        );
        return {session, task};
      }
    }
  }

  private applier(session: ClientSession): ManifestApplier {
    return new ManifestApplier(new ApplyEngine(session.k8.resources(), this.logger), this.logger);
  }

  /**
   * Runs a workflow in the background and publishes exactly one event for it: INFO when every step succeeded, ERROR
   * carrying the whole error chain otherwise.
   */
  private schedule(
    session: ClientSession,
    request: InstallRequest,
    messages: WorkflowMessages,
    step: WorkflowStep,
  ): WorkflowTask {
    return session.tasks.schedule(request.operationName, async (signal: AbortSignal): Promise<void> => {
      try {
        await step(signal);
      } catch (error) {
        this.logger.error(new AdapterError(`operation ${request.operationName} failed`, error));
        const summary: string = request.isDelete ? messages.removeFailed : messages.deployFailed;
        await this.publish(session, errorEvent(request.operationId, summary, formatErrorChain(error)), signal);
        throw error;
      }

      const outcome: {summary: string; details: string} = request.isDelete ? messages.removed : messages.deployed;
      await this.publish(session, infoEvent(request.operationId, outcome.summary, outcome.details), signal);
      this.logger.info(`operation ${request.operationName} completed (id: ${request.operationId})`);
    });
  }

  private async publish(session: ClientSession, event: MeshEvent, signal: AbortSignal): Promise<void> {
    try {
      await session.events.put(event, signal);
    } catch (error) {
      this.logger.warn(new AdapterError(`event for operation ${event.operationId} dropped on cancellation`, error));
    }
  }

  private async installMesh(
    session: ClientSession,
    namespace: string,
    isDelete: boolean,
    signal: AbortSignal,
  ): Promise<void> {
    const engine: ApplyEngine = new ApplyEngine(session.k8.resources(), this.logger);
    const applier: ManifestApplier = new ManifestApplier(engine, this.logger);

    if (isDelete) {
      try {
        const manifest: string = await this.manifestSource.dataplaneManifest(namespace);
        signal.throwIfAborted();
        await applier.apply(manifest, namespace, true);
      } catch (error) {
        await this.teardownSupportingObjects(engine, namespace, 'after a failed removal');
        throw error;
      }
      await this.teardownSupportingObjects(engine, namespace, 'after removing the dataplane');
      return;
    }

    await this.supportingObjects.provision(engine, namespace);
    signal.throwIfAborted();
    const manifest: string = await this.manifestSource.dataplaneManifest(namespace);
    signal.throwIfAborted();
    await applier.apply(manifest, namespace, false);
  }

  /**
   * Supporting object teardown never decides the outcome of a removal; its failures are only logged.
   */
  private async teardownSupportingObjects(engine: ApplyEngine, namespace: string, stage: string): Promise<void> {
    try {
      await this.supportingObjects.teardown(engine, namespace);
    } catch (error) {
      this.logger.warn(new AdapterError(`unable to remove the supporting objects ${stage}`, error));
    }
  }

  private async installDemoApp(
    session: ClientSession,
    namespace: string,
    isDelete: boolean,
    signal: AbortSignal,
  ): Promise<void> {
    const resources: Resources = session.k8.resources();
    const engine: ApplyEngine = new ApplyEngine(resources, this.logger);

    // without a target namespace every demo object keeps its own and there is nothing to label
    if (!isDelete && namespace) {
      await this.enableInjection(resources, namespace);
      signal.throwIfAborted();
      await this.copyRegistrySecret(resources, engine, session.dataplaneNamespace, namespace);
      signal.throwIfAborted();
    }

    const manifest: string = await this.manifestSource.demoManifest();
    signal.throwIfAborted();
    await new ManifestApplier(engine, this.logger).apply(manifest, namespace, isDelete);
  }

  private async enableInjection(resources: Resources, namespace: string): Promise<void> {
    const reference: StructuredDocument = {apiVersion: 'v1', kind: 'Namespace', metadata: {name: namespace}};
    try {
      const current: StructuredDocument = await resources.get(NAMESPACES, undefined, reference);
      const labelled: StructuredDocument = {
        ...current,
        metadata: {
          ...current.metadata,
          labels: {...current.metadata?.labels, [INJECTION_LABEL_KEY]: INJECTION_LABEL_VALUE},
        },
      };
      await resources.update(NAMESPACES, undefined, labelled);
    } catch (error) {
      throw new AdapterError(`unable to label namespace ${namespace} for injection`, error);
    }
    this.logger.info(`namespace ${namespace} labelled ${INJECTION_LABEL_KEY}=${INJECTION_LABEL_VALUE}`);
  }

  private async copyRegistrySecret(
    resources: Resources,
    engine: ApplyEngine,
    sourceNamespace: string,
    targetNamespace: string,
  ): Promise<void> {
    const reference: StructuredDocument = {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {name: DOCKER_REGISTRY_SECRET_NAME, namespace: sourceNamespace},
    };

    let source: StructuredDocument;
    try {
      source = await resources.get(SECRETS, sourceNamespace, reference);
    } catch (error) {
      throw new AdapterError(`unable to read ${DOCKER_REGISTRY_SECRET_NAME} from namespace ${sourceNamespace}`, error);
    }

    const metadata: V1ObjectMeta = {...source.metadata, namespace: targetNamespace};
    delete metadata.resourceVersion;
    delete metadata.uid;
    delete metadata.creationTimestamp;
    delete metadata.managedFields;

    await engine.execute({document: {...source, metadata}, coordinate: SECRETS}, false);
  }
}
