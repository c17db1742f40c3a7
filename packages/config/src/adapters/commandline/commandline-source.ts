import type { Command } from "commander"
import type { Logger } from "@layerconf/logger"
import { isConfigValue } from "../../core/coercion/coercion"
import { CoercionError, SourceParseError } from "../../core/errors"
import type { SourceCapabilities } from "../../ports/source"
import type { SourceValue } from "../../ports/value"
import { placeEntry, type SourceTree, walk } from "../tree/tree"
import { TreeSource, type TreeSourceOptions } from "../tree/tree-source"

export type CommandlineSourceOptions = TreeSourceOptions & {
  /** @default process.argv.slice(2) */
  argv?: readonly string[] | undefined

  /**
   * A commander program declaring the options. Its argument parsers give the values their
   * types; without one every `--name=value` is read generically.
   */
  command?: Command | undefined
}

const splitName = (name: string) => {
  const segments = name.split("-").filter((segment) => segment !== "")
  const key = segments.pop()

  return key === undefined ? undefined : { path: segments, key }
}

/**
 * Generic reading: `--a-b=v` is key `b` in subsection `a`, a bare `--flag` is `true`, and a
 * repeated `--name=value` collects a list. Anything not starting with `--` is ignored.
 */
export function parseGenericArgv(argv: readonly string[], logger: Logger): SourceTree {
  const tree: SourceTree = new Map()

  for (const arg of argv) {
    if (!arg.startsWith("--")) continue
    const body = arg.slice(2)
    const eq = body.indexOf("=")
    const name = splitName(eq === -1 ? body : body.slice(0, eq))
    if (!name) continue

    let value: SourceValue = eq === -1 ? true : body.slice(eq + 1)
    const previous = walk(tree, name.path)?.get(name.key)

    if (typeof value === "string") {
      if (typeof previous === "string") value = [previous, value]
      else if (Array.isArray(previous)) value = [...previous, value]
    }

    if (!placeEntry(tree, name.path, name.key, value)) {
      logger.warn("argument collides with an existing key or subsection, skipped", {
        key: arg,
        path: name.path.join("."),
      })
    }
  }

  return tree
}

function parseConfigured(
  command: Command,
  argv: readonly string[],
  source: string,
  logger: Logger,
): SourceTree {
  command.exitOverride()
  command.configureOutput({
    writeErr: (text) => logger.debug(text.trimEnd(), { op: "parse" }),
  })

  try {
    command.parse([...argv], { from: "user" })
  } catch (err) {
    throw new SourceParseError(source, undefined, err)
  }

  const values: Record<string, unknown> = command.opts()
  const tree: SourceTree = new Map()

  for (const option of command.options) {
    const attribute = option.attributeName()
    const value = values[attribute]
    // a declared default is not something the user passed
    const origin = command.getOptionValueSource(attribute)
    if (value === undefined || origin === undefined || origin === "default") continue

    const long = option.name()
    const name = splitName(option.negate ? long.replace(/^no-/, "") : long)
    if (!name) continue

    if (!isConfigValue(value)) {
      throw new CoercionError({ raw: value, kind: "configuration value", key: long })
    }
    if (!placeEntry(tree, name.path, name.key, value)) {
      logger.warn("option collides with an existing key or subsection, skipped", {
        key: long,
        path: name.path.join("."),
      })
    }
  }

  return tree
}

/**
 * Command-line arguments as a source. Arguments are parsed once, at construction; `load()`
 * keeps that result. Nothing is persisted.
 *
 * @throws SourceParseError when a configured command rejects the arguments
 */
export class CommandlineSource extends TreeSource {
  readonly kind = "commandline"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: true,
    writable: false,
  }

  constructor(options: CommandlineSourceOptions = {}) {
    super("commandline", options)
    const argv = options.argv ?? process.argv.slice(2)

    this.tree = options.command
      ? parseConfigured(options.command, argv, this.name, this.logger)
      : parseGenericArgv(argv, this.logger)
  }

  async load(): Promise<void> {}

  protected async persist(): Promise<void> {}

  protected isTyped(value: SourceValue): boolean {
    return typeof value !== "string"
  }
}
