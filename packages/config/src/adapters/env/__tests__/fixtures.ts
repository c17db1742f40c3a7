export const simpleEnv = {
  MYAPP_HOME: "appdata",
  MYAPP_PROCESSES: "8",
  MYAPP_FORCE: "True",
  MYAPP_EXTRA: "alpha, beta",
  MYAPP_EXPIRES: "2024-03-09",
  MYAPP_LASTRUN: "2024-03-09 08:05:30",
}

export const complexEnv = {
  MYAPP_HOME: "appdata",
  MYAPP_PROCESSES: "8",
  MYAPP_FORCE: "True",
  MYAPP_EXTRA: "alpha, beta",
  MYAPP_WORKER_FORCE: "False",
  MYAPP_WORKER_EXTRA: "alpha, gamma",
  MYAPP_WORKER_EXPIRES: "2024-03-09",
  MYAPP_WORKER_ARBITRARY_NESTING_DEPTH: "works",
  MYAPP_EXTRAMODULE_UNIQUE: "True",
}

export const simpleTextValues = {
  home: "appdata",
  processes: "8",
  force: "True",
  extra: "alpha, beta",
  expires: "2024-03-09",
  lastrun: "2024-03-09 08:05:30",
}
