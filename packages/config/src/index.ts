export { CommandlineSource, type CommandlineSourceOptions, parseGenericArgv } from "./adapters/commandline/commandline-source"
export { DefaultsSource } from "./adapters/defaults/defaults-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FileTreeSource, type FileSourceOptions } from "./adapters/file/file-tree-source"
export { IniSource, type IniSourceOptions } from "./adapters/ini/ini-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { PlistSource, type PlistSourceOptions } from "./adapters/plist/plist-source"
export type { SourceEntry, SourceTree } from "./adapters/tree/tree"
export { TreeSection, TreeSource, type TreeSourceOptions } from "./adapters/tree/tree-source"
export { YamlSource, type YamlSourceOptions } from "./adapters/yaml/yaml-source"
export {
  boolConvert,
  dateConvert,
  datetimeConvert,
  floatConvert,
  intConvert,
  isConfigValue,
  kindOf,
  listConvert,
  type ToTypedOptions,
  toRaw,
  toTyped,
  toTypedValue,
} from "./core/coercion/coercion"
export {
  CoercionError,
  KeyNotFoundError,
  NotLayeredConfigError,
  SourceParseError,
  SourceUnavailableError,
  WriteTargetError,
} from "./core/errors"
export { createLayeredConfig, LayeredConfig } from "./core/layered-config"
export { type LoadLayeredConfigOptions, loadLayeredConfig } from "./core/load"
export {
  type ConfigObject,
  type ResolvedEntry,
  Resolver,
  ResolverNode,
  type ResolverOptions,
  type SourceHit,
} from "./core/resolver/resolver"
export { CalendarDate } from "./core/value/calendar-date"
export { Type, TypeHint } from "./core/value/type-hint"
export type { ConfigSource, SourceCapabilities, SourceKind } from "./ports/source"
export type {
  ConfigValue,
  ScalarKind,
  SourceValue,
  TypedValue,
  ValueKind,
  ValueOf,
} from "./ports/value"
