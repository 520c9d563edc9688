// Declarative schema types. A schema is produced once by an external loader
// (or written inline) and compiled into a `RootSpec` by `compile`.

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | {[key: string]: JsonValue};

/** Structured configuration produced by a successful parse */
export type Config = {[dest: string]: JsonValue};

/** Environment lookup, `undefined` when the variable is unset */
export type EnvLookup = (name: string) => string | undefined;

// ---
// Types
// ---

export declare type ScalarType =
  | 'string'
  | 'int'
  | 'float'
  | 'bool'
  | 'enum'
  | 'file'
  | 'dir'
  | 'path';

export interface ListType {
  list: ScalarType;
  /** Defaults to `,` */
  separator?: string;
}

export interface PairType {
  pair: readonly [ScalarType, ScalarType];
  separator?: string;
}

export interface TripleType {
  triple: readonly [ScalarType, ScalarType, ScalarType];
  separator?: string;
}

export declare type TypeSpec = ScalarType | ListType | PairType | TripleType;

// ---
// Documentation & environment
// ---

/** A single line, or one entry per line */
export declare type DocString = string | readonly string[];

/** One or more names; single characters are short (`-v`), others long */
export declare type ArgNames = readonly [string, ...string[]];

export interface EnvBindingObj {
  var: string;
  doc?: DocString;
}

export declare type EnvBinding = string | EnvBindingObj;

export interface EnvInfo {
  var: string;
  doc?: DocString;
}

export interface ExitInfo {
  code: number;
  max?: number;
  doc: DocString;
}

// ---
// Arguments
// ---

export interface Flag {
  kind: 'flag';
  names: ArgNames;
  doc: DocString;
  dest?: string;
  env?: EnvBinding;
  /** Count occurrences instead of storing `true` */
  repeated?: boolean;
  deprecated?: string;
}

export interface FlagGroupEntry {
  names: ArgNames;
  doc: DocString;
  value: JsonValue;
}

export interface FlagGroup {
  kind: 'flag-group';
  dest: string;
  doc: DocString;
  default: JsonValue;
  flags: readonly FlagGroupEntry[];
  repeated?: boolean;
}

export interface Option {
  kind: 'option';
  names: ArgNames;
  doc: DocString;
  type: TypeSpec;
  docv?: string;
  /** `null` is a set default, a missing key is no default */
  default?: JsonValue;
  required?: boolean;
  repeated?: boolean;
  /** Closed set of values for an `enum` option */
  choices?: readonly string[];
  mustExist?: boolean;
  dest?: string;
  env?: EnvBinding;
}

export interface Positional {
  kind: 'positional';
  /** Also the dest */
  name: string;
  doc: DocString;
  type: TypeSpec;
  docv?: string;
  default?: JsonValue;
  required?: boolean;
  repeated?: boolean;
  mustExist?: boolean;
}

export declare type Argument = Flag | FlagGroup | Option | Positional;

// ---
// Commands
// ---

export interface Command {
  name: string;
  doc: DocString;
  args?: readonly Argument[];
  commands?: readonly Command[];
  envs?: readonly EnvInfo[];
  exits?: readonly ExitInfo[];
}

export interface ConfigPaths {
  system?: string;
  user?: string;
  local?: string;
}

/** Runtime configuration file description */
export interface ConfigFile {
  format: string;
  paths?: ConfigPaths;
}

export interface Root extends Command {
  version?: string;
  config?: ConfigFile;
}
