import { BaseError } from "@layerconf/errors"

const dotted = (path: readonly string[]) => path.join(".")

const qualified = (path: readonly string[], key: string) =>
  path.length === 0 ? key : `${dotted(path)}.${key}`

/** No source has a value for the key, directly or through cascade. */
export class KeyNotFoundError extends BaseError<"config_key_not_found"> {
  constructor(
    readonly key: string,
    readonly path: readonly string[] = [],
  ) {
    super(`no configuration value for "${qualified(path, key)}"`, {
      code: "config_key_not_found",
      context: { key, path: dotted(path) },
    })
  }
}

export type WriteTargetErrorOptions = {
  key: string
  path: readonly string[]
  target?: string | undefined
  reason?: string | undefined
}

/**
 * A `set` found no source that knows the key, no source matching the requested target, or a
 * target that cannot hold the key.
 */
export class WriteTargetError extends BaseError<"config_write_target_unresolvable"> {
  constructor({ key, path, target, reason }: WriteTargetErrorOptions) {
    const fallback =
      target === undefined ? "no source defines it" : `no source named "${target}"`

    super(`cannot set "${qualified(path, key)}": ${reason ?? fallback}`, {
      code: "config_write_target_unresolvable",
      context: { key, path: dotted(path), ...(target !== undefined && { target }) },
    })
  }
}

export type CoercionErrorOptions = {
  raw: unknown
  kind: string
  key?: string | undefined
  detail?: string | undefined
  cause?: unknown
}

export class CoercionError extends BaseError<"config_coercion_failed"> {
  constructor({ raw, kind, key, detail, cause }: CoercionErrorOptions) {
    const subject = key === undefined ? "value" : `"${key}"`
    const shown = typeof raw === "string" ? JSON.stringify(raw) : String(raw)

    super(`cannot read ${subject} ${shown} as ${kind}${detail ? `\n${detail}` : ""}`, {
      code: "config_coercion_failed",
      context: { kind, ...(key !== undefined && { key }), raw },
      cause,
    })
  }
}

/** A required source file could not be read. */
export class SourceUnavailableError extends BaseError<"config_source_unavailable"> {
  constructor(source: string, file: string, cause: unknown) {
    super(`cannot read ${file} for source ${source}`, {
      code: "config_source_unavailable",
      context: { source, file },
      cause,
    })
  }
}

/** A source's backing document or argument list is malformed. */
export class SourceParseError extends BaseError<"config_source_parse_failed"> {
  constructor(source: string, file: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ""

    super(`cannot parse ${file ?? "input"} for source ${source}${reason}`, {
      code: "config_source_parse_failed",
      context: { source, ...(file !== undefined && { file }) },
      cause,
    })
  }
}

export class NotLayeredConfigError extends BaseError<"config_not_layered"> {
  constructor() {
    super("expected a LayeredConfig view", {
      code: "config_not_layered",
      isOperational: false,
    })
  }
}
