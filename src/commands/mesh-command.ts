// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import {inject, injectable} from 'tsyringe-neo';
import {v4 as uuidv4} from 'uuid';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type AdapterLogger} from '../core/logging/adapter-logger.js';
import {AdapterError} from '../core/errors/adapter-error.js';
import {MissingArgumentError} from '../core/errors/missing-argument-error.js';
import {type OctarineAdapter} from '../business/adapter/octarine-adapter.js';
import {type InstallRequest} from '../business/install/install-request.js';
import {type WorkflowOutcome, type WorkflowTask} from '../business/session/workflow-task.js';
import {type ArgvStruct, type CommandFlags} from '../types/flag-types.js';
import {type Optional} from '../types/index.js';
import {Flags as flags} from './flags.js';
import {ConsoleEventSink} from './console-event-sink.js';

export const NO_FLAGS: CommandFlags = {
  required: [],
  optional: [flags.devMode],
};

export const APPLY_FLAGS: CommandFlags = {
  required: [flags.operation],
  optional: [
    flags.namespace,
    flags.username,
    flags.deleteOperation,
    flags.customBodyFile,
    flags.kubeconfig,
    flags.context,
    flags.devMode,
  ],
};

/**
 * Command line handlers driving an {@link OctarineAdapter}.
 */
@injectable()
export class MeshCommand {
  private readonly adapter: OctarineAdapter;
  private readonly logger: AdapterLogger;

  public constructor(
    @inject(InjectTokens.OctarineAdapter) adapter?: OctarineAdapter,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
  ) {
    this.adapter = patchInject(adapter, InjectTokens.OctarineAdapter, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public async name(argv: ArgvStruct): Promise<boolean> {
    this.logger.setDevMode(flags.booleanValue(argv, flags.devMode));
    this.logger.showUser(this.adapter.meshName());
    return true;
  }

  public async operations(argv: ArgvStruct): Promise<boolean> {
    this.logger.setDevMode(flags.booleanValue(argv, flags.devMode));
    const listing: Record<string, string> = this.adapter.supportedOperations();
    return this.logger.showList(
      'Supported operations',
      Object.entries(listing).map(([key, displayName]: [string, string]): string => `${key}: ${displayName}`),
    );
  }

  /**
   * Runs one operation. Background operations are followed on the terminal until they report.
   */
  public async apply(argv: ArgvStruct): Promise<boolean> {
    this.logger.setDevMode(flags.booleanValue(argv, flags.devMode));

    const operationName: Optional<string> = flags.stringValue(argv, flags.operation);
    if (!operationName) {
      throw new MissingArgumentError(`--${flags.operation.name} is required`);
    }

    const kubeconfigFile: Optional<string> = flags.stringValue(argv, flags.kubeconfig);
    this.adapter.createClient({
      kubeconfig: kubeconfigFile ? await MeshCommand.readFile(kubeconfigFile, 'kubeconfig') : undefined,
      contextName: flags.stringValue(argv, flags.context),
    });

    const customBodyFile: Optional<string> = flags.stringValue(argv, flags.customBodyFile);
    const request: InstallRequest = {
      operationId: uuidv4(),
      operationName,
      namespace: flags.stringValue(argv, flags.namespace) ?? '',
      username: flags.stringValue(argv, flags.username) ?? '',
      customBody: customBodyFile ? await MeshCommand.readFile(customBodyFile, 'custom body') : '',
      isDelete: flags.booleanValue(argv, flags.deleteOperation),
    };

    const task: Optional<WorkflowTask> = await this.adapter.applyOperation(request);
    if (!task) {
      this.logger.showUser(`operation ${operationName} applied`);
      return true;
    }

    return this.follow(task, request.operationId);
  }

  private async follow(task: WorkflowTask, operationId: string): Promise<boolean> {
    const streamController: AbortController = new AbortController();
    const sink: ConsoleEventSink = new ConsoleEventSink(this.logger, operationId, streamController);

    await this.adapter.streamEvents(sink, streamController.signal);
    const outcome: WorkflowOutcome = await task.result;
    if (outcome.status === 'failure') {
      throw new AdapterError(`operation ${task.operationName} failed`, outcome.error);
    }
    return true;
  }

  private static async readFile(file: string, description: string): Promise<string> {
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error) {
      throw new AdapterError(`unable to read the ${description} file ${file}`, error);
    }
  }
}
