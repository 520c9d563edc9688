import {makeConverter} from './converter.js';
import type {ValidatorRegistry} from './validator.js';
import type {
  ArgNames,
  Argument,
  EnvBinding,
  Flag,
  FlagGroup,
  Option,
  Positional,
} from './typings/model-types.js';
import type {
  ArgSpec,
  EnvSpec,
  FlagGroupSpec,
  FlagSpec,
  OptionSpec,
  PositionalSpec,
} from './typings/spec-types.js';

/** First long name (more than one character), else the first name */
export function resolveDest(names: ArgNames): string {
  return names.find(name => name.length > 1) ?? names[0];
}

export function resolveEnv(binding: EnvBinding): EnvSpec {
  return typeof binding === 'string'
    ? {var: binding}
    : {var: binding.var, doc: binding.doc};
}

/** Compiles schema arguments into specs, binding converters and validators */
export class ArgCompiler {
  readonly validators: ValidatorRegistry;

  constructor(validators: ValidatorRegistry) {
    this.validators = validators;
  }

  compile(argument: Argument): ArgSpec {
    switch (argument.kind) {
      case 'flag':
        return this.flag(argument);
      case 'flag-group':
        return this.flagGroup(argument);
      case 'option':
        return this.option(argument);
      case 'positional':
        return this.positional(argument);
    }
  }

  compileAll(args: readonly Argument[] = []): ArgSpec[] {
    return args.map(a => this.compile(a));
  }

  flag(flag: Flag): FlagSpec {
    return {
      kind: 'flag',
      names: flag.names,
      dest: flag.dest ?? resolveDest(flag.names),
      repeated: flag.repeated ?? false,
      env: flag.env === undefined ? undefined : resolveEnv(flag.env),
      deprecated: flag.deprecated,
    };
  }

  flagGroup(group: FlagGroup): FlagGroupSpec {
    return {
      kind: 'flag-group',
      dest: group.dest,
      defaultValue: group.default,
      entries: group.flags.map(({names, value}) => ({names, value})),
      repeated: group.repeated ?? false,
    };
  }

  option(option: Option): OptionSpec {
    return {
      kind: 'option',
      names: option.names,
      dest: option.dest ?? resolveDest(option.names),
      type: option.type,
      converter: makeConverter(option.type, option.choices),
      validator: this.validators.fromOption(option),
      defaultValue: option.default,
      repeated: option.repeated ?? false,
      env: option.env === undefined ? undefined : resolveEnv(option.env),
    };
  }

  positional(positional: Positional): PositionalSpec {
    return {
      kind: 'positional',
      name: positional.name,
      dest: positional.name,
      type: positional.type,
      converter: makeConverter(positional.type),
      validator: this.validators.fromPositional(positional),
      defaultValue: positional.default,
      repeated: positional.repeated ?? false,
    };
  }
}
