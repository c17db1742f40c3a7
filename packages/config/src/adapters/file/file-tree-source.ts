import fs from "node:fs/promises"
import path from "node:path"
import { SourceParseError, SourceUnavailableError } from "../../core/errors"
import { TreeSource, type TreeSourceOptions } from "../tree/tree-source"
import type { SourceTree } from "../tree/tree"

/**
 * Options shared by file-backed sources.
 */
export type FileSourceOptions = TreeSourceOptions & {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`. Without a file the source starts empty, accepts
   * writes and has nowhere to persist them.
   *
   * @example "app.ini", "./config/app.yaml"
   */
  file?: string | undefined

  /**
   * Whether the file must exist.
   *
   * - `true`: `load()` throws SourceUnavailableError if the file cannot be read.
   * - `false`: an unreadable file loads as an empty source.
   *
   * @default false
   */
  required?: boolean | undefined

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string | undefined
}

const isErrnoCode = (err: unknown, code: string) =>
  err instanceof Error && "code" in err && err.code === code

export abstract class FileTreeSource extends TreeSource {
  protected readonly file: string | undefined
  private readonly required: boolean

  constructor(kind: string, options: FileSourceOptions) {
    super(options.file === undefined ? kind : `${kind}:${options.file}`, options)
    this.file =
      options.file === undefined
        ? undefined
        : path.resolve(options.cwd ?? process.cwd(), options.file)
    this.required = options.required ?? false
  }

  protected abstract parse(content: string): SourceTree

  protected abstract serialize(tree: SourceTree): string

  async load(): Promise<void> {
    if (this.file === undefined) {
      this.replaceTree(new Map())
      return
    }

    let content: string
    try {
      content = await fs.readFile(this.file, "utf-8")
    } catch (err) {
      if (this.required) throw new SourceUnavailableError(this.name, this.file, err)

      if (isErrnoCode(err, "ENOENT")) {
        this.logger.debug("file not found, starting empty", { file: this.file, op: "load" })
      } else {
        this.logger.warn("file unreadable, starting empty", { file: this.file, op: "load", err })
      }
      this.replaceTree(new Map())
      return
    }

    try {
      this.replaceTree(this.parse(content))
    } catch (err) {
      if (err instanceof SourceParseError) throw err
      throw new SourceParseError(this.name, this.file, err)
    }
  }

  protected async persist(): Promise<void> {
    if (this.file === undefined) {
      this.logger.debug("no file to write to", { op: "write" })
      return
    }

    await fs.writeFile(this.file, this.serialize(this.tree), "utf-8")
    this.logger.info("wrote configuration file", { file: this.file, op: "write" })
  }
}
