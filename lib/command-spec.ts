import type {ArgCompiler} from './arg-spec.js';
import type {Argument, Command, Root} from './typings/model-types.js';
import type {ArgSpec, CommandSpec, RootSpec} from './typings/spec-types.js';

export class CommandCompiler {
  readonly args: ArgCompiler;

  constructor(args: ArgCompiler) {
    this.args = args;
  }

  /** Compile a command and, depth-first, its subcommands */
  command(command: Command): CommandSpec {
    return {
      name: command.name,
      doc: command.doc,
      args: this.args.compileAll(command.args),
      commands: this.commands(command.commands),
    };
  }

  commands(commands: readonly Command[] = []): CommandSpec[] {
    return commands.map(c => this.command(c));
  }

  root(root: Root): RootSpec {
    return {
      ...this.command(root),
      version: root.version,
      config: root.config,
    };
  }

  /** Compile a whole schema, or a single argument */
  compileAny(input: Root | Argument): RootSpec | ArgSpec {
    return isArgument(input) ? this.args.compile(input) : this.root(input);
  }
}

export function isArgument(input: Root | Argument): input is Argument {
  return 'kind' in input;
}
