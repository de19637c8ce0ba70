import { BaseError, ErrorCodes } from "@respire/errors"
import { type Arguments, argumentsFrom, first, iterateArguments } from "../arguments/arguments"
import type { SharedBytes } from "../bytes/shared-bytes"

export type Cmd =
  | { readonly kind: "get"; readonly key: SharedBytes }
  | { readonly kind: "set"; readonly key: SharedBytes; readonly value: SharedBytes }
  | { readonly kind: "del"; readonly keys: Arguments<SharedBytes> }

export type CommandErrorCode =
  | typeof ErrorCodes.EmptyCommand
  | typeof ErrorCodes.UnknownCommand
  | typeof ErrorCodes.WrongArity

/**
 * A request that is well formed on the wire but not a command we run.
 * The message is the reply text sent back to the client.
 */
export class CommandError extends BaseError<CommandErrorCode> {
  constructor(code: CommandErrorCode, message: string, command?: string) {
    super(message, { code, context: command === undefined ? {} : { command } })
  }
}

export type CommandParseResult =
  | { readonly ok: true; readonly cmd: Cmd }
  | { readonly ok: false; readonly error: CommandError }

function printable(keyword: SharedBytes): string {
  return keyword.toString("latin1").replace(/[\r\n]/g, " ")
}

function wrongArity(name: string): CommandParseResult {
  return {
    ok: false,
    error: new CommandError(
      ErrorCodes.WrongArity,
      `ERR wrong number of arguments for '${name}' command`,
      name,
    ),
  }
}

/**
 * Recognise a request. Keywords match case-sensitively; arity counts the
 * keyword itself.
 */
export function parseCommand(args: Arguments<SharedBytes>): CommandParseResult {
  const keyword = first(args)

  if (keyword === undefined) {
    return { ok: false, error: new CommandError(ErrorCodes.EmptyCommand, "ERR empty command") }
  }

  const name = printable(keyword)

  switch (name) {
    case "GET":
      return args.kind === "two" ? { ok: true, cmd: { kind: "get", key: args.b } } : wrongArity(name)
    case "SET":
      return args.kind === "three"
        ? { ok: true, cmd: { kind: "set", key: args.b, value: args.c } }
        : wrongArity(name)
    case "DEL": {
      if (args.kind === "one") return wrongArity(name)

      const keys = iterateArguments(args)
      keys.next()

      return { ok: true, cmd: { kind: "del", keys: argumentsFrom(keys) } }
    }
    default:
      return {
        ok: false,
        error: new CommandError(ErrorCodes.UnknownCommand, `ERR unknown command '${name}'`, name),
      }
  }
}
