export {
  defaultConfigSources,
  ENV_PREFIX,
  loadServerConfig,
  type ServerConfig,
  serverConfigSchema,
  toServerOptions,
  toStoreOptions,
} from "./config"
export { Connection, type ConnectionState, type ConnectionStats } from "./connection/connection"
export { ConnectionManager } from "./connection/connection-manager"
export type { ConnectionSocket } from "./connection/connection-socket"
export { createServer, type Server } from "./create-server"
export { type CommandDispatcher, Dispatcher } from "./dispatch/dispatcher"
export {
  FrameTooLargeError,
  ProtocolError,
  ServerAlreadyStartedError,
  StartupFailedError,
} from "./errors/protocol-errors"
export {
  createReplyFormatter,
  DEFAULT_REPLY_MAPPINGS,
  type ReplyFormatter,
  type ReplyMapping,
  type ReplyMappingsConfig,
} from "./errors/reply-formatter"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
  PhaseResult,
} from "./lifecycle/lifecycle-hook"
export type { BoundAddress } from "./lifecycle/listen"
export type { ServerDependencies, ServerOptions } from "./server-options"
