import { Command } from "commander"
import { intConvert } from "../../../core/coercion/coercion"
import { CoercionError, SourceParseError } from "../../../core/errors"
import { Resolver } from "../../../core/resolver/resolver"
import { DefaultsSource } from "../../defaults/defaults-source"
import { CommandlineSource } from "../commandline-source"
import { complexProgram } from "./fixtures"

describe("CommandlineSource behavior", () => {
  it("ignores positional arguments", () => {
    const source = new CommandlineSource({ argv: ["build", "--home=appdata", "-v"] })

    expect(source.keys()).toEqual(["home"])
  })

  it("keeps a single occurrence as text and collects repeats into a list", () => {
    const source = new CommandlineSource({
      argv: ["--tag=one", "--name=solo", "--tag=two", "--tag=three"],
    })

    expect(source.get("tag")).toEqual(["one", "two", "three"])
    expect(source.get("name")).toBe("solo")
    expect(source.typed("name")).toBe(false)
  })

  it("keeps the text after the first equals sign", () => {
    const source = new CommandlineSource({ argv: ["--filter=level=debug", "--empty="] })

    expect(source.get("filter")).toBe("level=debug")
    expect(source.get("empty")).toBe("")
  })

  it("maps dashed names to subsections", () => {
    const source = new CommandlineSource({ argv: ["--worker-limits-cpu=2"] })

    expect(source.subsections()).toEqual(["worker"])
    expect(source.subsection("worker").subsection("limits").get("cpu")).toBe("2")
  })

  it("reads process.argv by default", () => {
    const saved = process.argv
    process.argv = ["node", "app", "--home=appdata"]

    try {
      expect(new CommandlineSource().get("home")).toBe("appdata")
    } finally {
      process.argv = saved
    }
  })

  it("leaves options the user did not pass absent", () => {
    const source = new CommandlineSource({ argv: ["--home=appdata"], command: complexProgram() })

    expect(source.keys()).toEqual(["home"])
    expect(source.subsections()).toEqual([])
  })

  it("leaves out option defaults the user did not override", () => {
    const program = () =>
      new Command()
        .option("--processes <n>", "worker processes", intConvert, 1)
        .option("--no-color", "plain output")
    const idle = new CommandlineSource({ argv: [], command: program() })
    const passed = new CommandlineSource({ argv: ["--processes=4"], command: program() })

    expect(idle.keys()).toEqual([])
    expect(passed.keys()).toEqual(["processes"])
    expect(passed.get("processes")).toBe(4)
  })

  it("does not let option defaults outrank lower sources", () => {
    const command = new Command().option("--processes <n>", "worker processes", intConvert, 1)
    const resolver = new Resolver([
      new DefaultsSource({ processes: 8 }),
      new CommandlineSource({ argv: [], command }),
    ])

    expect(resolver.root.lookup("processes")).toBe(8)
    expect(resolver.root.explain("processes")).toBe("defaults")
  })

  it("strips the no- prefix of negated options", () => {
    const command = new Command().option("--no-color", "plain output")
    const source = new CommandlineSource({ argv: ["--no-color"], command })

    expect(source.get("color")).toBe(false)
  })

  it("wraps rejected arguments in SourceParseError", () => {
    const build = (argv: string[]) => new CommandlineSource({ argv, command: complexProgram() })

    expect(() => build(["--unknown-flag"])).toThrow(SourceParseError)
    expect(() => build(["--processes=many"])).toThrow(SourceParseError)
  })

  it("rejects option values that are not configuration values", () => {
    const command = new Command().option("--size <n>", "size", (value) => ({ value }))

    expect(() => new CommandlineSource({ argv: ["--size=3"], command })).toThrow(CoercionError)
  })
})
