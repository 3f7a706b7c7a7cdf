// Editor Plugin Engine — Public API Surface
export { createCLI } from './cli/index.js';
export { PluginRegistry, RegistryWatcher } from './plugins/registry.js';
export { PluginLoader, DEFINITION_FILES } from './plugins/loader.js';
export { scaffoldPlugin } from './plugins/scaffold.js';
export { matchesContext, triggersFor, listCommands, findTrigger } from './triggers/matcher.js';
export { matchesGlob } from './triggers/glob.js';
export { ActionExecutor } from './actions/executor.js';
export { applyTransform, TRANSFORMS } from './actions/transforms.js';
export { createScriptEngines, JavaScriptEngine, LuaScriptEngine } from './scripting/index.js';
export { PluginHost } from './host/host.js';
export { TextDocument, DocumentBridge } from './bridge/document.js';
export { captureContext } from './bridge/types.js';
export { ConfigLoader } from './config/loader.js';
export { Logger, createSilentLogger } from './logging/logger.js';
export { languageForPath } from './utils/language.js';
export {
    PluginEngineError,
    DiscoveryError,
    ValidationError,
    ActionError,
    ChainError,
    ScriptError,
    BridgeError,
    ConfigError,
    describeError,
} from './errors.js';

// Types
export type { Plugin, Trigger, TriggerKind, Action, ContextFilter, RegistrySnapshot } from './plugins/types.js';
export type { TriggerMatch, CommandEntry, CommandGroup, FilterSubject } from './triggers/matcher.js';
export type { ActionResult, ExecutionRequest } from './actions/executor.js';
export type { ScriptEngine, ScriptRunOptions } from './scripting/index.js';
export type { InvocationReport, EventKind } from './host/host.js';
export type { CapabilityBridge, ExecutionContext, CursorPosition, SelectionRange } from './bridge/types.js';
export type { Notification, NotificationSink } from './bridge/document.js';
export type { EngineConfig, ConfigFile } from './config/schema.js';
export type { LogLevel } from './logging/logger.js';
export type { ErrorCode, EngineId } from './errors.js';
