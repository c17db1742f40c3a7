export const simpleIni = `
[__root__]
home = appdata
processes = 8
force = True
extra = alpha, beta
expires = 2024-03-09
lastrun = 2024-03-09 08:05:30
`

export const complexIni = `
[__root__]
home = appdata
processes = 8
force = True
extra = alpha, beta

[worker]
force = False
extra = alpha, gamma
expires = 2024-03-09

[extramodule]
unique = True
`
