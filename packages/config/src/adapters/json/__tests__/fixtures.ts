export const simpleJson = JSON.stringify({
  home: "appdata",
  processes: 8,
  force: true,
  extra: ["alpha", "beta"],
  expires: "2024-03-09",
  lastrun: "2024-03-09 08:05:30",
})

export const complexJson = JSON.stringify({
  home: "appdata",
  processes: 8,
  force: true,
  extra: ["alpha", "beta"],
  worker: {
    force: false,
    extra: ["alpha", "gamma"],
    expires: "2024-03-09",
    arbitrary: { nesting: { depth: "works" } },
  },
  extramodule: { unique: true },
})
