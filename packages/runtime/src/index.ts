/**
 * @capbridge/runtime - host capabilities for QuickJS scripts
 */

export { ErrorChannel, SOFT_FAILURE, isSoftFailure } from "./context/error-channel.js";
export type { SoftFailure } from "./context/error-channel.js";
export { ExecutionContext } from "./context/execution-context.js";
export type { ExecutionContextOptions } from "./context/execution-context.js";

export { CapabilityRegistry } from "./registry/capability-registry.js";
export { ArgReader, defineAsyncCapability, defineCapability } from "./registry/capability.js";
export type {
  AsyncCapability,
  Capability,
  CapabilityInfo,
  CapabilityResult,
  ParamShape,
  ParamSpec,
  SyncCapability,
} from "./registry/capability.js";

export { createCatalog, responseValue } from "./catalog/index.js";

export { createHostServices } from "./services/index.js";
export type { HostServices } from "./services/index.js";
export { SessionStore, newSession } from "./services/session-store.js";
export type { PendingRequest } from "./services/session-store.js";
export { UndiciTransport, defaultDispatcher } from "./services/http-transport.js";
export type { DispatcherFactory, HttpResponse, HttpSession, HttpTransport, OutgoingRequest } from "./services/http-transport.js";
export { parseRequestOptions, RequestOptionsSchema } from "./services/request-options.js";
export type { RequestOptions } from "./services/request-options.js";
export { DirectoryService, createLdaptsConnector, escapeDnValue } from "./services/directory.js";
export type { DirectoryConnection, DirectoryConnector, SearchBindOutcome } from "./services/directory.js";
export { createMysqlProbe } from "./services/sql-probe.js";
export type { SqlProbe, SqlTarget } from "./services/sql-probe.js";
export { spawnProcess } from "./services/process-runner.js";
export type { ProcessRunner } from "./services/process-runner.js";
export { NetworkPolicyEnforcer } from "./policy/network.js";

export { ScriptRuntime } from "./harness/quickjs-runtime.js";
export type { RunResult, ScriptRuntimeOptions } from "./harness/quickjs-runtime.js";
export { ScriptExecutor } from "./harness/executor.js";
export type { ExecutionResult } from "./harness/executor.js";

export { ConfigError, loadConfig } from "./config/load-config.js";
export { createLogger } from "./logger.js";
