import type {Converter} from '../converter.js';
import type {Validator} from '../validator.js';
import type {
  ArgNames,
  Config,
  ConfigFile,
  DocString,
  JsonValue,
  TypeSpec,
} from './model-types.js';

// ---
// Compiled arguments
// ---

export interface EnvSpec {
  readonly var: string;
  readonly doc?: DocString;
}

export interface FlagSpec {
  readonly kind: 'flag';
  readonly names: ArgNames;
  readonly dest: string;
  readonly repeated: boolean;
  readonly env?: EnvSpec;
  readonly deprecated?: string;
}

export interface FlagGroupEntrySpec {
  readonly names: ArgNames;
  readonly value: JsonValue;
}

export interface FlagGroupSpec {
  readonly kind: 'flag-group';
  readonly dest: string;
  readonly defaultValue: JsonValue;
  readonly entries: readonly FlagGroupEntrySpec[];
  readonly repeated: boolean;
}

export interface OptionSpec {
  readonly kind: 'option';
  readonly names: ArgNames;
  readonly dest: string;
  readonly type: TypeSpec;
  readonly converter: Converter;
  readonly validator: Validator;
  /** `undefined` when no default is declared */
  readonly defaultValue: JsonValue | undefined;
  readonly repeated: boolean;
  readonly env?: EnvSpec;
}

export interface PositionalSpec {
  readonly kind: 'positional';
  readonly name: string;
  readonly dest: string;
  readonly type: TypeSpec;
  readonly converter: Converter;
  readonly validator: Validator;
  readonly defaultValue: JsonValue | undefined;
  readonly repeated: boolean;
}

export declare type ArgSpec =
  | FlagSpec
  | FlagGroupSpec
  | OptionSpec
  | PositionalSpec;

// ---
// Compiled commands
// ---

export interface CommandSpec {
  readonly name: string;
  readonly doc: DocString;
  readonly args: readonly ArgSpec[];
  readonly commands: readonly CommandSpec[];
}

export interface RootSpec extends CommandSpec {
  readonly version?: string;
  readonly config?: ConfigFile;
}

// ---
// Parse results
// ---

export interface ParseOk {
  kind: 'ok';
  config: Config;
  commandPath: string[];
}

export interface HelpRequest {
  kind: 'help';
  commandPath: string[];
}

export interface VersionRequest {
  kind: 'version';
}

export interface ManpageRequest {
  kind: 'manpage';
  commandPath: string[];
}

export declare type ParseResult =
  | ParseOk
  | HelpRequest
  | VersionRequest
  | ManpageRequest;

export declare type ArgsInput = string | readonly string[];
