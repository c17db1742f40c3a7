import { z } from "zod"
import type { ConfigValue, ScalarKind, TypedValue } from "../../ports/value"
import { CoercionError } from "../errors"
import { CalendarDate } from "../value/calendar-date"

const DATE = /^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})$/
const DATETIME =
  /^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[ T](?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?<fraction>\.\d+)?Z?$/

const booleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false"]))
  .transform((value) => value === "true")

const integerSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "expected a base-10 integer")
  .transform(Number)

const floatSchema = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i, "expected a decimal number")
  .transform(Number)

const dateSchema = z
  .string()
  .trim()
  .regex(DATE, "expected YYYY-MM-DD")
  .transform((value, ctx) => {
    const groups = DATE.exec(value)?.groups
    const [year, month, day] = [groups?.year, groups?.month, groups?.day].map(Number)

    if (year === undefined || month === undefined || day === undefined) return z.NEVER
    if (!CalendarDate.isValid(year, month, day)) {
      ctx.issues.push({ code: "custom", message: "no such calendar day", input: value })
      return z.NEVER
    }

    return new CalendarDate(year, month, day)
  })

const datetimeSchema = z
  .string()
  .trim()
  .regex(DATETIME, "expected YYYY-MM-DD HH:MM:SS")
  .transform((value, ctx) => {
    const groups = DATETIME.exec(value)?.groups
    const [year, month, day, hour, minute, second] = [
      groups?.year,
      groups?.month,
      groups?.day,
      groups?.hour,
      groups?.minute,
      groups?.second,
    ].map(Number)

    if (
      year === undefined ||
      month === undefined ||
      day === undefined ||
      hour === undefined ||
      minute === undefined ||
      second === undefined
    ) {
      return z.NEVER
    }
    if (!CalendarDate.isValid(year, month, day) || hour > 23 || minute > 59 || second > 59) {
      ctx.issues.push({ code: "custom", message: "no such point in time", input: value })
      return z.NEVER
    }
    const millis = groups?.fraction ? Math.round(Number(`0${groups.fraction}`) * 1000) : 0

    return new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis))
  })

const listSchema = z.string().transform((value) =>
  value.trim() === "" ? [] : value.split(",").map((item) => item.trim()),
)

function parseWith<T>(
  schema: z.ZodType<T, string>,
  raw: string,
  kind: ScalarKind,
  key?: string,
): T {
  const result = schema.safeParse(raw)

  if (!result.success) {
    throw new CoercionError({
      raw,
      kind,
      key,
      detail: z.prettifyError(result.error),
      cause: result.error,
    })
  }

  return result.data
}

export type ToTypedOptions = {
  /**
   * Keep text that is not a boolean literal as a string instead of failing. Only affects
   * `boolean`; a literal `true` default implies the kind loosely.
   */
  lenient?: boolean | undefined

  /** Key name for error messages. */
  key?: string | undefined
}

/**
 * Converts untyped text to a value of `kind`.
 *
 * @throws CoercionError when `raw` is not a valid encoding of `kind`
 */
export function toTyped(raw: string, kind: ScalarKind, options: ToTypedOptions = {}): TypedValue {
  const { key, lenient = false } = options

  switch (kind) {
    case "string":
      return { kind, value: raw }
    case "boolean": {
      if (!lenient) return { kind, value: parseWith(booleanSchema, raw, kind, key) }
      const result = booleanSchema.safeParse(raw)

      return result.success ? { kind, value: result.data } : { kind: "string", value: raw }
    }
    case "integer":
      return { kind, value: parseWith(integerSchema, raw, kind, key) }
    case "float":
      return { kind, value: parseWith(floatSchema, raw, kind, key) }
    case "list":
      return { kind, value: parseWith(listSchema, raw, kind, key) }
    case "date":
      return { kind, value: parseWith(dateSchema, raw, kind, key) }
    case "datetime":
      return { kind, value: parseWith(datetimeSchema, raw, kind, key) }
  }
}

const pad = (n: number) => String(n).padStart(2, "0")

/** Text encoding of a value, as untyped backends store it. */
export function toRaw(value: ConfigValue): string {
  if (value === null) return ""
  if (typeof value === "boolean") return value ? "True" : "False"
  if (Array.isArray(value)) return value.join(", ")
  if (value instanceof Date) {
    const day = CalendarDate.fromDate(value).toString()
    const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`
    const millis = value.getUTCMilliseconds()

    return millis === 0 ? `${day} ${time}` : `${day} ${time}.${String(millis).padStart(3, "0")}`
  }

  return String(value)
}

export function toTypedValue(value: ConfigValue): TypedValue {
  if (value === null) return { kind: "null", value }
  if (typeof value === "string") return { kind: "string", value }
  if (typeof value === "boolean") return { kind: "boolean", value }
  if (typeof value === "number") {
    return Number.isInteger(value) ? { kind: "integer", value } : { kind: "float", value }
  }
  if (Array.isArray(value)) return { kind: "list", value }
  if (value instanceof CalendarDate) return { kind: "date", value }

  return { kind: "datetime", value }
}

export function kindOf(value: ConfigValue) {
  return toTypedValue(value).kind
}

export function isConfigValue(value: unknown): value is ConfigValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      if (value === null || value instanceof CalendarDate) return true
      if (value instanceof Date) return !Number.isNaN(value.getTime())

      return Array.isArray(value) && value.every((item) => typeof item === "string")
    default:
      return false
  }
}

export const boolConvert = (raw: string): boolean => parseWith(booleanSchema, raw, "boolean")

export const intConvert = (raw: string): number => parseWith(integerSchema, raw, "integer")

export const floatConvert = (raw: string): number => parseWith(floatSchema, raw, "float")

export const dateConvert = (raw: string): CalendarDate => parseWith(dateSchema, raw, "date")

export const datetimeConvert = (raw: string): Date => parseWith(datetimeSchema, raw, "datetime")

export const listConvert = (raw: string): string[] => parseWith(listSchema, raw, "list")
