// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../../core/logging/adapter-logger.js';
import {AdapterError} from '../../core/errors/adapter-error.js';
import {ClientNotCreatedError} from '../../core/errors/client-not-created-error.js';
import {MESH_NAME} from '../../core/constants.js';
import {type K8Factory} from '../../integration/kube/k8-factory.js';
import {type K8} from '../../integration/kube/k8.js';
import {ClientSession} from '../session/client-session.js';
import {type WorkflowOutcome, type WorkflowTask} from '../session/workflow-task.js';
import {EventStreamer} from '../events/event-streamer.js';
import {type EventSink} from '../events/event-sink.js';
import {InstallOrchestrator, type OperationDispatch} from '../install/install-orchestrator.js';
import {type InstallRequest} from '../install/install-request.js';
import {SupportedOperations} from '../install/supported-operations.js';
import {type ClientOptions} from './client-options.js';
import {type Optional} from '../../types/index.js';

/**
 * The management-plane facing surface of the Octarine adapter.
 *
 * Holds the current {@link ClientSession}. Every call reads it once and passes that value down; a new client replaces
 * it without disturbing workflows already running on the previous one.
 */
@injectable()
export class OctarineAdapter {
  private session: Optional<ClientSession>;
  private readonly k8Factory: K8Factory;
  private readonly orchestrator: InstallOrchestrator;
  private readonly logger: AdapterLogger;
  private readonly eventQueueCapacity: number;

  public constructor(
    @inject(InjectTokens.K8Factory) k8Factory?: K8Factory,
    @inject(InjectTokens.InstallOrchestrator) orchestrator?: InstallOrchestrator,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
    @inject(InjectTokens.EventQueueCapacity) eventQueueCapacity?: number,
  ) {
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.orchestrator = patchInject(orchestrator, InjectTokens.InstallOrchestrator, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
    this.eventQueueCapacity = patchInject(eventQueueCapacity, InjectTokens.EventQueueCapacity, this.constructor.name);
  }

  public meshName(): string {
    return MESH_NAME;
  }

  public supportedOperations(): Record<string, string> {
    return SupportedOperations.listing();
  }

  public createClient(options: ClientOptions = {}): ClientSession {
    const k8: K8 = this.k8Factory.create(options.kubeconfig, options.contextName);
    this.session = ClientSession.create(k8, this.eventQueueCapacity);
    this.logger.info(`mesh client created for context ${k8.currentContext()} (session: ${this.session.id})`);
    return this.session;
  }

  public currentSession(): Optional<ClientSession> {
    return this.session;
  }

  /**
   * Runs or schedules one operation.
   *
   * @returns the background task, or `undefined` for operations that completed before returning
   * @throws UnsupportedOperationError - unknown operation name
   * @throws MissingArgumentError - `custom` without a body
   * @throws ClientNotCreatedError - no client was created yet
   */
  public async applyOperation(request: InstallRequest): Promise<Optional<WorkflowTask>> {
    InstallOrchestrator.validate(request);
    const session: ClientSession = this.requireSession();

    const dispatch: OperationDispatch = await this.orchestrator.dispatch(session, request);
    if (dispatch.session !== session && this.session?.id === session.id) {
      this.session = dispatch.session;
    }
    return dispatch.task;
  }

  /**
   * Delivers the current session's events to `sink` until `signal` aborts or a delivery fails.
   */
  public async streamEvents(sink: EventSink, signal: AbortSignal): Promise<void> {
    const session: ClientSession = this.requireSession();
    await new EventStreamer(session.events, this.logger).stream(sink, signal);
  }

  /**
   * Cancels the workflows of the current session and waits for them to settle.
   */
  public async close(): Promise<WorkflowOutcome[]> {
    if (!this.session) {
      return [];
    }
    const outcomes: WorkflowOutcome[] = await this.session.tasks.cancelAll(new AdapterError('adapter closed'));
    this.logger.info(`adapter closed, ${outcomes.length} workflow(s) cancelled`);
    return outcomes;
  }

  private requireSession(): ClientSession {
    if (!this.session) {
      throw new ClientNotCreatedError();
    }
    return this.session;
  }
}
