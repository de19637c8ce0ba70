import { SystemClock } from "@respire/clock"
import type { SharedBytes } from "@respire/codec"
import { serializeError } from "@respire/errors"
import { createLockedMemoryStore } from "@respire/kv"
import { createLogger } from "@respire/logger"
import { loadServerConfig, toServerOptions, toStoreOptions } from "./config"
import { createServer } from "./create-server"

async function main(): Promise<void> {
  const config = await loadServerConfig()

  const logger = createLogger({
    level: config.get("LOG_LEVEL"),
    prettify: config.get("LOG_PRETTY"),
    bindings: { service: "respire" },
  })

  const unknown = config.unknownKeys()
  if (unknown.length > 0) logger.warn("Ignoring unknown configuration keys", { keys: unknown })

  const clock = new SystemClock()
  const store = createLockedMemoryStore<SharedBytes>(toStoreOptions(config.value, clock))

  await createServer({ logger, clock, store }, toServerOptions(config.value))
    .setupProcessHandlers()
    .start()
}

main().catch((err: unknown) => {
  process.stderr.write(`${JSON.stringify(serializeError(err, { includeStack: true }))}\n`)
  process.exitCode = 1
})
