import type { ScalarKind } from "../../ports/value"

/**
 * Declares the expected kind of a key without giving it a value.
 *
 * A defaults map may hold a hint in place of a value. The key then stays unreadable until some
 * other source supplies a value, and that value is coerced to `kind`.
 */
export class TypeHint<K extends ScalarKind = ScalarKind> {
  constructor(readonly kind: K) {
    Object.freeze(this)
  }

  toString(): string {
    return `TypeHint(${this.kind})`
  }
}

export const Type = {
  string: new TypeHint("string"),
  integer: new TypeHint("integer"),
  float: new TypeHint("float"),
  boolean: new TypeHint("boolean"),
  list: new TypeHint("list"),
  date: new TypeHint("date"),
  datetime: new TypeHint("datetime"),
} as const
