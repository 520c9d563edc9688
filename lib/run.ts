import {CError} from './cerror.js';
import type {CmdParser} from './cmd-parser.js';
import type {CommandCompiler} from './command-spec.js';
import {manText, usageText} from './usage.js';
import type {UsageRenderer} from './usage.js';
import {maybeAsyncResult} from './utils/maybe-async-result.js';
import type {PlatformShim} from './typings/common-types.js';
import type {Config, EnvLookup, Root} from './typings/model-types.js';
import type {ArgsInput, ParseResult} from './typings/spec-types.js';

/** Application entry point; a missing exit code means 0 */
export type MainFunction = (
  config: Config,
  commandPath: string[]
) => number | void | Promise<number | void>;

export interface LoggerInstance {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /** Everything logged so far, one call per line */
  getOutput(): string;
}

export interface RunOptions {
  /** Defaults to the process arguments after the script */
  args?: ArgsInput;
  env?: EnvLookup;
  logger?: LoggerInstance;
  renderHelp?: UsageRenderer;
  renderManpage?: UsageRenderer;
  /** Call `process.exit` with the resulting code */
  exitProcess?: boolean;
}

/** Echoes to the console unless `echo` is false, and keeps its output */
export function createLogger(echo = true): LoggerInstance {
  let output = '';
  const write =
    (stream: 'log' | 'error') =>
    (...args: unknown[]) => {
      if (echo) console[stream](...args);
      if (output.length) output += '\n';
      output += args.join(' ');
    };
  return {
    log: write('log'),
    error: write('error'),
    getOutput: () => output,
  };
}

/** Parse, then dispatch to help, version or man output, or to `main` */
export class CmdRunner {
  readonly shim: PlatformShim;
  readonly compiler: CommandCompiler;
  readonly parser: CmdParser;

  constructor(
    shim: PlatformShim,
    compiler: CommandCompiler,
    parser: CmdParser
  ) {
    this.shim = shim;
    this.compiler = compiler;
    this.parser = parser;
  }

  run(
    root: Root,
    main: MainFunction,
    options: RunOptions = {}
  ): number | Promise<number> {
    const logger = options.logger ?? createLogger();
    const renderHelp = options.renderHelp ?? usageText;
    const renderManpage = options.renderManpage ?? manText;
    const args = options.args ?? this.shim.process.argv().slice(2);

    let result: ParseResult;
    try {
      result = this.parser.parse(this.compiler.root(root), args, options.env);
    } catch (err) {
      if (!(err instanceof CError)) throw err;
      logger.error(this.shim.format('%s: %s', root.name, err.message));
      logger.error(renderHelp(root, []).trimEnd());
      return this.#exit(1, options);
    }

    switch (result.kind) {
      case 'ok': {
        const {config, commandPath} = result;
        return maybeAsyncResult<number | void, number>(
          () => main(config, commandPath),
          code => this.#exit(typeof code === 'number' ? code : 0, options)
        );
      }
      case 'help':
        logger.log(renderHelp(root, result.commandPath).trimEnd());
        return this.#exit(0, options);
      case 'manpage':
        logger.log(renderManpage(root, result.commandPath).trimEnd());
        return this.#exit(0, options);
      case 'version':
        logger.log(this.shim.format('%s version %s', root.name, root.version));
        return this.#exit(0, options);
    }
  }

  #exit(code: number, {exitProcess}: RunOptions): number {
    if (exitProcess) this.shim.process.exit(code);
    return code;
  }
}
