const pad = (n: number, width = 2) => String(n).padStart(width, "0")

/**
 * A date without a time of day, e.g. an expiry date read from `2024-03-09`.
 *
 * Instances are immutable and compare by value through {@link CalendarDate.equals}.
 */
export class CalendarDate {
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {
    if (!CalendarDate.isValid(year, month, day)) {
      throw new RangeError(`invalid calendar date: ${year}-${month}-${day}`)
    }
    Object.freeze(this)
  }

  static isValid(year: number, month: number, day: number): boolean {
    if (![year, month, day].every(Number.isInteger)) return false
    if (month < 1 || month > 12 || day < 1) return false

    const candidate = new Date(Date.UTC(year, month - 1, day))

    return candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day
  }

  /** The UTC calendar day of `date`. */
  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate())
  }

  /** Midnight UTC of this day. */
  toDate(): Date {
    return new Date(Date.UTC(this.year, this.month - 1, this.day))
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`
  }

  toJSON(): string {
    return this.toString()
  }
}
