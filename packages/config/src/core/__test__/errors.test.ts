import { BaseError, serializeError } from "@layerconf/errors"
import {
  CoercionError,
  KeyNotFoundError,
  NotLayeredConfigError,
  SourceParseError,
  SourceUnavailableError,
  WriteTargetError,
} from "../errors"

describe("configuration errors", () => {
  it("KeyNotFoundError names the qualified key", () => {
    const err = new KeyNotFoundError("depth", ["worker", "arbitrary"])

    expect(err).toBeInstanceOf(BaseError)
    expect(err.code).toBe("config_key_not_found")
    expect(err.message).toBe('no configuration value for "worker.arbitrary.depth"')
    expect(err.context).toEqual({ key: "depth", path: "worker.arbitrary" })
  })

  it("WriteTargetError explains why no source was chosen", () => {
    expect(new WriteTargetError({ key: "home", path: [] }).message).toBe(
      'cannot set "home": no source defines it',
    )
    expect(new WriteTargetError({ key: "home", path: ["worker"], target: "yaml" }).message).toBe(
      'cannot set "worker.home": no source named "yaml"',
    )
  })

  it("CoercionError shows the raw value and the wanted kind", () => {
    const err = new CoercionError({ raw: "many", kind: "integer", key: "processes" })

    expect(err.message).toBe('cannot read "processes" "many" as integer')
    expect(err.context).toEqual({ kind: "integer", key: "processes", raw: "many" })
  })

  it("source errors keep their cause", () => {
    const cause = new Error("unexpected token")
    const parse = new SourceParseError("json:app.json", "/srv/app.json", cause)
    const unavailable = new SourceUnavailableError("ini:app.ini", "/srv/app.ini", cause)

    expect(parse.message).toBe("cannot parse /srv/app.json for source json:app.json: unexpected token")
    expect(parse.cause).toBe(cause)
    expect(unavailable.message).toBe("cannot read /srv/app.ini for source ini:app.ini")
    expect(serializeError(unavailable).cause?.message).toBe("unexpected token")
  })

  it("NotLayeredConfigError is a programming error", () => {
    expect(new NotLayeredConfigError().isOperational).toBe(false)
  })
})
