import { Command } from "commander"
import { boolConvert, dateConvert, datetimeConvert, intConvert } from "../../../core/coercion/coercion"

export const simpleArgv = [
  "--home=appdata",
  "--processes=8",
  "--force",
  "--extra=alpha",
  "--extra=beta",
  "--expires=2024-03-09",
  "--lastrun=2024-03-09 08:05:30",
]

export const complexArgv = [
  "--home=appdata",
  "--processes=8",
  "--force=True",
  "--extra=alpha",
  "--extra=beta",
  "--worker-force=False",
  "--worker-extra=alpha",
  "--worker-extra=gamma",
  "--worker-expires=2024-03-09",
  "--worker-arbitrary-nesting-depth=works",
  "--extramodule-unique",
]

export const collect = (value: string, previous: string[] = []) => [...previous, value]

export function simpleProgram() {
  return new Command("simple")
    .option("--home <dir>", "home directory of the app")
    .option("--processes <n>", "number of worker processes", intConvert)
    .option("--force [bool]", "overwrite existing output", boolConvert)
    .option("--extra <item>", "extra item, repeatable", collect)
    .option("--expires <date>", "expiry date", dateConvert)
    .option("--lastrun <datetime>", "time of the last run", datetimeConvert)
    .option("--unused <value>", "never passed")
}

export function complexProgram() {
  return new Command("complex")
    .option("--home <dir>", "home directory of the app")
    .option("--processes <n>", "number of worker processes", intConvert)
    .option("--force [bool]", "overwrite existing output", boolConvert)
    .option("--extra <item>", "extra item, repeatable", collect)
    .option("--worker-force [bool]", "overwrite in the worker", boolConvert)
    .option("--worker-extra <item>", "worker extra item, repeatable", collect)
    .option("--worker-expires <date>", "worker expiry date", dateConvert)
    .option("--worker-arbitrary-nesting-depth <value>", "deeply nested setting")
    .option("--extramodule-unique [bool]", "unique mode")
}
