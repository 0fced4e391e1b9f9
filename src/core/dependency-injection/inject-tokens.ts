// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export class InjectTokens {
  public static LogLevel: symbol = Symbol.for('LogLevel');
  public static DevelopmentMode: symbol = Symbol.for('DevelopmentMode');
  public static LogDestination: symbol = Symbol.for('LogDestination');
  public static LogsDirectory: symbol = Symbol.for('LogsDirectory');
  public static AdapterLogger: symbol = Symbol.for('AdapterLogger');
  public static ErrorHandler: symbol = Symbol.for('ErrorHandler');
  public static K8Factory: symbol = Symbol.for('K8Factory');
  public static TemplatesDirectory: symbol = Symbol.for('TemplatesDirectory');
  public static ManifestsDirectory: symbol = Symbol.for('ManifestsDirectory');
  public static TemplateRenderer: symbol = Symbol.for('TemplateRenderer');
  public static ManifestSource: symbol = Symbol.for('ManifestSource');
  public static OctarineSettings: symbol = Symbol.for('OctarineSettings');
  public static EventQueueCapacity: symbol = Symbol.for('EventQueueCapacity');
  public static SupportingObjects: symbol = Symbol.for('SupportingObjects');
  public static InstallOrchestrator: symbol = Symbol.for('InstallOrchestrator');
  public static MeshVet: symbol = Symbol.for('MeshVet');
  public static OctarineAdapter: symbol = Symbol.for('OctarineAdapter');
  public static MeshCommand: symbol = Symbol.for('MeshCommand');
  public static MeshCommandDefinition: symbol = Symbol.for('MeshCommandDefinition');
}
