// Platform agnostic entrypoint for cmdschema, i.e., this factory wires the
// compiler, parser and runner to one platform shim.
//
// Works by accepting a shim which shims methods that contain platform
// specific logic (env lookup, filesystem checks, process access).
import {ArgCompiler} from './arg-spec.js';
import {CmdParser} from './cmd-parser.js';
import {CommandCompiler} from './command-spec.js';
import {CmdRunner} from './run.js';
import type {MainFunction, RunOptions} from './run.js';
import {ValidatorRegistry} from './validator.js';
import type {PlatformShim} from './typings/common-types.js';
import type {Argument, EnvLookup, Root} from './typings/model-types.js';
import type {
  ArgSpec,
  ArgsInput,
  ParseResult,
  RootSpec,
} from './typings/spec-types.js';

export interface CmdInstance {
  readonly shim: PlatformShim;
  readonly validators: ValidatorRegistry;
  /** Compile a schema root, or a single argument */
  compile(root: Root): RootSpec;
  compile(argument: Argument): ArgSpec;
  compileArgs(args: readonly Argument[]): ArgSpec[];
  parse(root: RootSpec, args: ArgsInput, env?: EnvLookup): ParseResult;
  run(
    root: Root,
    main: MainFunction,
    options?: RunOptions
  ): number | Promise<number>;
}

export function CmdFactory(shim: PlatformShim): CmdInstance {
  const validators = new ValidatorRegistry(shim.fs);
  const argCompiler = new ArgCompiler(validators);
  const compiler = new CommandCompiler(argCompiler);
  const parser = new CmdParser(shim);
  const runner = new CmdRunner(shim, compiler, parser);

  function compile(root: Root): RootSpec;
  function compile(argument: Argument): ArgSpec;
  function compile(input: Root | Argument): RootSpec | ArgSpec {
    return compiler.compileAny(input);
  }

  return {
    shim,
    validators,
    compile,
    compileArgs: args => argCompiler.compileAll(args),
    parse: (root, args, env) => parser.parse(root, args, env),
    run: (root, main, options) => runner.run(root, main, options),
  };
}
