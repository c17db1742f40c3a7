import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { CalendarDate } from "../../../core/value/calendar-date"
import { YamlSource } from "../yaml-source"
import { complexYaml, simpleYaml } from "./fixtures"

describeConfigSourceContract({
  name: "YamlSource",
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, "simple.yaml"), simpleYaml)
    await fs.writeFile(path.join(cwd, "complex.yaml"), complexYaml)
  },
  make: (cwd) => ({
    simple: new YamlSource({ file: "simple.yaml", cwd }),
    complex: new YamlSource({ file: "complex.yaml", cwd }),
  }),
  expectedValues: () => ({
    home: "appdata",
    processes: 8,
    force: true,
    extra: ["alpha", "beta"],
    expires: new CalendarDate(2024, 3, 9),
    lastrun: new Date(Date.UTC(2024, 2, 9, 8, 5, 30)),
  }),
  typedKeys: ["processes", "force", "extra", "expires", "lastrun"],
})
