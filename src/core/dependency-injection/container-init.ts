// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {AdapterPinoLogger} from '../logging/adapter-pino-logger.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {ErrorHandler} from '../error-handler.js';
import {TemplateRenderer} from '../template-renderer.js';
import {K8ClientFactory} from '../../integration/kube/k8-client/k8-client-factory.js';
import {FileManifestSource} from '../../business/install/manifest-source.js';
import {SupportingObjects} from '../../business/install/supporting-objects.js';
import {InstallOrchestrator} from '../../business/install/install-orchestrator.js';
import {MeshVet} from '../../business/vet/mesh-vet.js';
import {OctarineAdapter} from '../../business/adapter/octarine-adapter.js';
import {MeshCommand} from '../../commands/mesh-command.js';
import {MeshCommandDefinition} from '../../commands/command-definitions/mesh-command-definition.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    logLevel: string = constants.ADAPTER_LOG_LEVEL,
    developmentMode: boolean = constants.ADAPTER_DEV_OUTPUT,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.AdapterLogger, AdapterPinoLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.K8Factory, K8ClientFactory),
      new SingletonContainer(InjectTokens.TemplateRenderer, TemplateRenderer),
      new SingletonContainer(InjectTokens.ManifestSource, FileManifestSource),
      new SingletonContainer(InjectTokens.SupportingObjects, SupportingObjects),
      new SingletonContainer(InjectTokens.MeshVet, MeshVet),
      new SingletonContainer(InjectTokens.InstallOrchestrator, InstallOrchestrator),
      new SingletonContainer(InjectTokens.OctarineAdapter, OctarineAdapter),
      new SingletonContainer(InjectTokens.MeshCommand, MeshCommand),
      new SingletonContainer(InjectTokens.MeshCommandDefinition, MeshCommandDefinition),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogDestination, undefined),
      new ValueContainer(InjectTokens.LogsDirectory, constants.ADAPTER_LOGS_DIR),
      new ValueContainer(InjectTokens.TemplatesDirectory, constants.TEMPLATES_DIR),
      new ValueContainer(InjectTokens.ManifestsDirectory, constants.MANIFESTS_DIR),
      new ValueContainer(InjectTokens.OctarineSettings, constants.OCTARINE_SETTINGS),
      new ValueContainer(InjectTokens.EventQueueCapacity, constants.EVENT_QUEUE_CAPACITY),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(logLevel?: string, developmentMode?: boolean, overrides?: InstanceOverrides): void {
    if (Container.isInitialized) {
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
