import type { CalendarDate } from "../core/value/calendar-date"
import type { TypeHint } from "../core/value/type-hint"

/**
 * Any value a configuration key can resolve to.
 *
 * A `Date` is a datetime and a {@link CalendarDate} is a date without time. `null` is a present
 * but empty value, which is not the same thing as an absent key.
 */
export type ConfigValue = string | number | boolean | null | string[] | CalendarDate | Date

export type ValueKind =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "list"
  | "date"
  | "datetime"
  | "null"

/** Kinds a {@link TypeHint} can declare. */
export type ScalarKind = Exclude<ValueKind, "null">

export type TypedValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "list"; readonly value: string[] }
  | { readonly kind: "date"; readonly value: CalendarDate }
  | { readonly kind: "datetime"; readonly value: Date }
  | { readonly kind: "null"; readonly value: null }

export type ValueOf<K extends ValueKind> = Extract<TypedValue, { kind: K }>["value"]

/** What a source may hold at a leaf: a value, or only a declaration of its kind. */
export type SourceValue = ConfigValue | TypeHint
