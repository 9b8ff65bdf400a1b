import * as z from "zod"
import { Field, FieldOptionsSchema, parseOptions, type FieldOptions } from "@/fields/base"
import { boundErrors, type BoundOptions } from "@/fields/basic"
import { FieldError } from "@/fields/issues"
import type { Introspection } from "@/types"

export interface DateTimeOptions extends FieldOptions, BoundOptions<Date> {}

const validDate = z.date().refine((d) => !Number.isNaN(d.getTime()), { message: "must be a valid date" })

const DateTimeOptionsSchema = FieldOptionsSchema.extend({
  gt: validDate.optional(),
  gte: validDate.optional(),
  lt: validDate.optional(),
  lte: validDate.optional(),
})

const toTime = (date: Date | undefined): number | undefined => date?.getTime()

const formatTime = (time: number): string => new Date(time).toISOString()

/**
 * Accepts valid `Date` instances, optionally bounded with `gt`, `gte`, `lt` and `lte`,
 * which must themselves be dates. Invalid dates (`new Date("nope")`) are rejected.
 */
export class DateTime extends Field {
  readonly type: string = "datetime"

  readonly gt?: Date
  readonly gte?: Date
  readonly lt?: Date
  readonly lte?: Date

  constructor(options: DateTimeOptions = {}) {
    super(options)
    const parsed = parseOptions(DateTimeOptionsSchema, options, new.target.name)
    this.gt = parsed.gt
    this.gte = parsed.gte
    this.lt = parsed.lt
    this.lte = parsed.lte
  }

  errors(value: unknown): FieldError[] {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      return [new FieldError("Not a valid Date instance")]
    }

    return boundErrors(
      value.getTime(),
      {
        gt: toTime(this.gt),
        gte: toTime(this.gte),
        lt: toTime(this.lt),
        lte: toTime(this.lte),
      },
      formatTime,
    )
  }

  introspect(): Introspection {
    return this.describe({
      gt: this.gt?.toISOString(),
      gte: this.gte?.toISOString(),
      lt: this.lt?.toISOString(),
      lte: this.lte?.toISOString(),
    })
  }
}
