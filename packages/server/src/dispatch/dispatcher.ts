import {
  type Arguments,
  argumentsToArray,
  type Cmd,
  data,
  int,
  mapArguments,
  nil,
  okay,
  parseCommand,
  type SharedBytes,
  type Value,
} from "@respire/codec"
import { type KeyValueStore, type KvKey, kvKeyFromBytes } from "@respire/kv"
import type { Logger } from "@respire/logger"
import {
  createReplyFormatter,
  DEFAULT_REPLY_MAPPINGS,
  isMappedError,
  type ReplyFormatter,
  type ReplyMappingsConfig,
} from "../errors/reply-formatter"

export interface CommandDispatcher {
  /** Run one request. Never rejects: failures come back as `error` values. */
  dispatch(args: Arguments<SharedBytes>): Promise<Value>
}

export type DispatcherDeps = {
  store: KeyValueStore<SharedBytes>
  logger: Logger
}

export type DispatcherOptions = {
  replies?: ReplyMappingsConfig
}

export class Dispatcher implements CommandDispatcher {
  private readonly replies: ReplyMappingsConfig
  private readonly formatError: ReplyFormatter

  constructor(
    private readonly deps: DispatcherDeps,
    opts: DispatcherOptions = {},
  ) {
    this.replies = opts.replies ?? DEFAULT_REPLY_MAPPINGS
    this.formatError = createReplyFormatter(this.replies)
  }

  async dispatch(args: Arguments<SharedBytes>): Promise<Value> {
    const parsed = parseCommand(args)

    if (!parsed.ok) {
      this.deps.logger.debug("Rejected command", { err: parsed.error })
      return this.formatError(parsed.error)
    }

    try {
      return await this.execute(parsed.cmd)
    } catch (err) {
      const command = parsed.cmd.kind.toUpperCase()

      if (isMappedError(this.replies, err)) {
        this.deps.logger.warn("Command failed", { command, err })
      } else {
        this.deps.logger.error("Command failed unexpectedly", { command, err })
      }

      return this.formatError(err)
    }
  }

  private async execute(cmd: Cmd): Promise<Value> {
    const { store } = this.deps

    switch (cmd.kind) {
      case "get": {
        const result = await store.get(keyOf(cmd.key))

        return result.kind === "found" ? data(result.value) : nil()
      }
      case "set":
        await store.set(keyOf(cmd.key), cmd.value)

        return okay()
      case "del": {
        const keys = argumentsToArray(mapArguments(cmd.keys, keyOf))

        return int(await store.deleteMany(keys))
      }
    }
  }
}

function keyOf(bytes: SharedBytes): KvKey {
  return kvKeyFromBytes(bytes.view())
}
