import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SourceParseError, SourceUnavailableError } from "../../../core/errors"
import { CalendarDate } from "../../../core/value/calendar-date"
import { IniSource } from "../ini-source"
import { complexIni } from "./fixtures"

describe("IniSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "ini-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("starts empty when the file is missing", async () => {
    const source = new IniSource({ file: "nonexistent.ini", cwd })
    await source.load()

    expect(source.keys()).toEqual([])
    expect(source.subsections()).toEqual([])
  })

  it("throws when the file is missing and required", async () => {
    const source = new IniSource({ file: "nonexistent.ini", cwd, required: true })

    await expect(source.load()).rejects.toBeInstanceOf(SourceUnavailableError)
  })

  it("treats a directory in place of the file as unavailable", async () => {
    await fs.mkdir(path.join(cwd, "app.ini"))
    const source = new IniSource({ file: "app.ini", cwd, required: true })

    await expect(source.load()).rejects.toBeInstanceOf(SourceUnavailableError)
  })

  it("creates the file on first write", async () => {
    const source = new IniSource({ file: "created.ini", cwd })
    await source.load()

    source.set("datadir", "else")
    expect(source.dirty).toBe(true)
    await source.write()

    expect(source.dirty).toBe(false)
    expect(await fs.readFile(path.join(cwd, "created.ini"), "utf-8")).toBe(
      "[__root__]\ndatadir = else\n",
    )
  })

  it("stores the text encoding of typed values", async () => {
    const source = new IniSource()

    source.set("force", false)
    source.set("extra", ["alpha", "beta"])
    source.set("lastrun", new Date(Date.UTC(2024, 2, 9, 8, 5, 30)))

    expect(source.get("force")).toBe("False")
    expect(source.get("extra")).toBe("alpha, beta")
    expect(source.get("lastrun")).toBe("2024-03-09 08:05:30")
  })

  it("rewrites the whole file from a subsection write", async () => {
    const file = path.join(cwd, "complex.ini")
    await fs.writeFile(file, complexIni)
    const source = new IniSource({ file: "complex.ini", cwd })
    await source.load()

    const worker = source.subsection("worker")
    worker.set("expires", new CalendarDate(2024, 4, 1))
    await worker.write()

    expect(await fs.readFile(file, "utf-8")).toBe(
      [
        "[__root__]",
        "home = appdata",
        "processes = 8",
        "force = True",
        "extra = alpha, beta",
        "",
        "[worker]",
        "force = False",
        "extra = alpha, gamma",
        "expires = 2024-04-01",
        "",
        "[extramodule]",
        "unique = True",
        "",
      ].join("\n"),
    )
  })

  it("does not nest below one level", () => {
    const source = new IniSource()

    expect(() => source.subsection("worker").subsection("limits").set("cpu", 2)).toThrow(
      /one level of sections/,
    )
  })

  it("a DEFAULT root section shows through every section", async () => {
    await fs.writeFile(
      path.join(cwd, "default.ini"),
      complexIni.replace("[__root__]", "[DEFAULT]"),
    )
    const source = new IniSource({ file: "default.ini", cwd, rootSection: "DEFAULT" })
    await source.load()

    const worker = source.subsection("worker")

    expect(worker.get("force")).toBe("False")
    expect(worker.get("home")).toBe("appdata")
    expect(worker.keys()).toEqual(["force", "extra", "expires", "home", "processes"])
    expect(source.subsection("nowhere").has("home")).toBe(false)
  })

  it("keeps names and values verbatim", async () => {
    const file = path.join(cwd, "verbatim.ini")
    await fs.writeFile(
      file,
      [
        "# deployment settings",
        "[__root__]",
        "debug = true",
        "mode = null",
        "url = http://h/p#frag",
        "note = a; b",
        "; disabled = yes",
        "",
        "[db.primary]",
        "host: db1",
        "",
      ].join("\n"),
    )
    const source = new IniSource({ file: "verbatim.ini", cwd })
    await source.load()

    expect(source.get("debug")).toBe("true")
    expect(source.get("mode")).toBe("null")
    expect(source.get("url")).toBe("http://h/p#frag")
    expect(source.get("note")).toBe("a; b")
    expect(source.has("disabled")).toBe(false)
    expect(source.subsections()).toEqual(["db.primary"])
    expect(source.subsection("db.primary").keys()).toEqual(["host"])
  })

  it("rewrites untouched values as they were read", async () => {
    const file = path.join(cwd, "verbatim.ini")
    await fs.writeFile(
      file,
      "[__root__]\ndebug = true\nurl = http://h/p#frag\nnote = a; b\n\n[db.primary]\nhost = db1\n",
    )
    const source = new IniSource({ file: "verbatim.ini", cwd })
    await source.load()

    source.set("port", 5432)
    await source.write()

    expect(await fs.readFile(file, "utf-8")).toBe(
      [
        "[__root__]",
        "debug = true",
        "url = http://h/p#frag",
        "note = a; b",
        "port = 5432",
        "",
        "[db.primary]",
        "host = db1",
        "",
      ].join("\n"),
    )
  })

  it("continues a value on indented lines", async () => {
    const file = path.join(cwd, "motd.ini")
    await fs.writeFile(file, "[__root__]\nmotd = first line\n  second line\n")
    const source = new IniSource({ file: "motd.ini", cwd })
    await source.load()

    expect(source.get("motd")).toBe("first line\nsecond line")

    source.set("motd", "one\ntwo")
    await source.write()

    expect(await fs.readFile(file, "utf-8")).toBe("[__root__]\nmotd = one\n\ttwo\n")
  })

  it("rejects a line that is neither a section nor a key", async () => {
    await fs.writeFile(path.join(cwd, "broken.ini"), "[__root__]\njust some words\n")
    const source = new IniSource({ file: "broken.ini", cwd })

    await expect(source.load()).rejects.toBeInstanceOf(SourceParseError)
  })

  it("names itself after its file", () => {
    expect(new IniSource({ file: "app.ini" }).name).toBe("ini:app.ini")
    expect(new IniSource().name).toBe("ini")
  })
})
