/**
 * @license
 * Copyright (c) 2016, Contributors
 * SPDX-License-Identifier: ISC
 */

import {ConversionError, ParseError, ValidationError} from './cerror.js';
import {NameIndex} from './name-index.js';
import type {Match} from './name-index.js';
import {classifyToken, splitLongOption, tokenizeArgString} from './tokenize.js';
import type {PlatformShim} from './typings/common-types.js';
import type {Config, EnvLookup, JsonValue} from './typings/model-types.js';
import type {
  ArgsInput,
  ArgSpec,
  CommandSpec,
  HelpRequest,
  ManpageRequest,
  OptionSpec,
  ParseResult,
  PositionalSpec,
  RootSpec,
  VersionRequest,
} from './typings/spec-types.js';

// ---
// Constants
// ---

const HELP = '--help';
const HELP_MAN = '--help-man';
const VERSION = '--version';

const TRUTHY_ENV = ['true', '1'];
const FALSY_ENV = ['false', '0'];

// ---
// Level results
// ---

/** One command level parsed successfully up to `nextPos` */
interface LevelOk {
  kind: 'ok';
  config: Config;
  commandPath: string[];
  nextPos: number;
}

type LevelResult = LevelOk | HelpRequest | VersionRequest | ManpageRequest;

/** Mutable state of the level being scanned */
interface LevelState {
  readonly level: CommandSpec;
  readonly config: Config;
  /** Occurrences per argument index */
  readonly counts: number[];
}

// ---
// Parser
// ---

export class CmdParser {
  /** Platform specific functions (DI) */
  readonly shim: PlatformShim;
  /** Message formatter, defaults to util.format */
  readonly __: PlatformShim['format'];

  constructor(shim: PlatformShim) {
    this.shim = shim;
    this.__ = shim.format;
  }

  /**
   * Parse an argument vector against a compiled root.
   * The compiled root is only read; every call builds its own index and config.
   */
  parse(
    root: RootSpec,
    argsInput: ArgsInput,
    env: EnvLookup = this.shim.getEnv
  ): ParseResult {
    const tokens = tokenizeArgString(argsInput);
    const result = this.#parseLevel(root, tokens, 0, true, root.version);
    if (result.kind !== 'ok') return result;

    // order of precedence:
    // 1. command line arg
    // 2. value from env var
    // 3. declared default
    this.#postProcess(result.config, root, result.commandPath, 0, env);

    return {
      kind: 'ok',
      config: {...result.config},
      commandPath: result.commandPath,
    };
  }

  /** Scan one command level from `start`, recursing into subcommands */
  #parseLevel(
    level: CommandSpec,
    tokens: readonly string[],
    start: number,
    isRoot: boolean,
    version?: string
  ): LevelResult {
    const index = new NameIndex(level.args);
    const state: LevelState = {
      level,
      config: nullObj(),
      counts: level.args.map(() => 0),
    };
    const commandPath: string[] = [];
    const positionals = level.args.filter(isPositional);
    let cursor = 0;
    let terminated = false;
    let i = start;

    while (i < tokens.length) {
      const token = tokens[i];

      if (!terminated) {
        const kind = classifyToken(token);

        if (kind === 'double-dash') {
          terminated = true;
          i++;
          continue;
        }

        if (token === HELP) return {kind: 'help', commandPath};
        if (token === HELP_MAN) return {kind: 'manpage', commandPath};
        if (isRoot && token === VERSION) {
          if (version === undefined) {
            throw new ParseError(this.__('%s: no version defined', VERSION));
          }
          return {kind: 'version'};
        }

        if (kind === 'long-option') {
          const {name, value} = splitLongOption(token);
          const display = `--${name}`;
          const match = this.#lookup(index, display);
          if (match.kind === 'option') {
            let raw = value;
            if (raw === undefined) {
              i++;
              if (i >= tokens.length) {
                throw new ParseError(
                  this.__('option %s requires a value', display)
                );
              }
              raw = tokens[i];
            }
            this.#setOption(state, match, display, raw);
          } else {
            this.#setSwitch(state, match);
          }
          i++;
          continue;
        }

        if (kind === 'short-group') {
          for (let c = 1; c < token.length; c++) {
            const display = `-${token[c]}`;
            const match = this.#lookup(index, display);
            if (match.kind !== 'option') {
              this.#setSwitch(state, match);
              continue;
            }
            // No attached value form: the option takes the next token
            if (c !== token.length - 1) {
              throw new ParseError(
                this.__(
                  'option %s requires a value and must be last in a short group',
                  display
                )
              );
            }
            i++;
            if (i >= tokens.length) {
              throw new ParseError(
                this.__('option %s requires a value', display)
              );
            }
            this.#setOption(state, match, display, tokens[i]);
          }
          i++;
          continue;
        }

        const command = level.commands.find(cmd => cmd.name === token);
        if (command) {
          commandPath.push(command.name);
          const sub = this.#parseLevel(command, tokens, i + 1, false);
          if (sub.kind === 'version') return sub;
          if (sub.kind !== 'ok') {
            return {
              kind: sub.kind,
              commandPath: commandPath.concat(sub.commandPath),
            };
          }
          // Inner levels overwrite colliding keys
          Object.keys(sub.config).forEach(key => {
            state.config[key] = sub.config[key];
          });
          commandPath.push(...sub.commandPath);
          i = sub.nextPos;
          continue;
        }
      }

      const slot = positionals[cursor];
      if (!slot) {
        throw new ParseError(
          !terminated && level.commands.length
            ? this.__('unknown subcommand: %s', token)
            : this.__('unexpected positional argument: %s', token)
        );
      }
      const converted = this.#convert(slot, `positional ${slot.name}`, token);
      if (slot.repeated) {
        append(state.config, slot.dest, converted);
      } else {
        state.config[slot.dest] = converted;
        cursor++;
      }
      i++;
    }

    return {kind: 'ok', config: state.config, commandPath, nextPos: i};
  }

  #lookup(index: NameIndex, display: string): Match {
    const match = index.lookup(display);
    if (!match) {
      throw new ParseError(this.__('unknown option: %s', display));
    }
    return match;
  }

  /** Record a flag or flag-group entry occurrence */
  #setSwitch({level, config, counts}: LevelState, match: Match): void {
    const spec = level.args[match.argIndex];
    counts[match.argIndex]++;
    if (spec.kind === 'flag') {
      config[spec.dest] = spec.repeated ? counts[match.argIndex] : true;
    } else if (spec.kind === 'flag-group') {
      const value = clone(spec.entries[match.entryIndex].value);
      if (spec.repeated) append(config, spec.dest, value);
      else config[spec.dest] = value;
    }
  }

  #setOption(
    {level, config}: LevelState,
    match: Match,
    display: string,
    raw: string
  ): void {
    const spec = level.args[match.argIndex];
    if (spec.kind !== 'option') return;
    const converted = this.#convert(spec, `option ${display}`, raw);
    if (spec.repeated) append(config, spec.dest, converted);
    else config[spec.dest] = converted;
  }

  /** Convert a raw token, naming the argument in the error */
  #convert(
    spec: OptionSpec | PositionalSpec,
    label: string,
    raw: string
  ): JsonValue {
    try {
      return spec.converter.parse(raw);
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new ParseError(this.__('%s: %s', label, err.message));
      }
      throw err;
    }
  }

  // ---
  // Post-processing
  // ---

  /** Env fallback, defaults and validation for each level of the path */
  #postProcess(
    config: Config,
    level: CommandSpec,
    commandPath: readonly string[],
    pathIndex: number,
    env: EnvLookup
  ): void {
    this.#applyEnv(config, level.args, env);
    this.#applyDefaults(config, level.args);
    this.#runValidators(config, level.args);

    if (pathIndex < commandPath.length) {
      const command = level.commands.find(
        cmd => cmd.name === commandPath[pathIndex]
      );
      if (command) {
        this.#postProcess(config, command, commandPath, pathIndex + 1, env);
      }
    }
  }

  #applyEnv(config: Config, args: readonly ArgSpec[], env: EnvLookup): void {
    args.forEach(spec => {
      if (spec.kind === 'flag') {
        if (spec.dest in config && config[spec.dest] !== false) return;
        const raw = spec.env && env(spec.env.var);
        if (!spec.env || raw === undefined) return;
        config[spec.dest] = this.#envBoolean(spec.env.var, raw);
      } else if (spec.kind === 'option') {
        if (spec.dest in config) return;
        const raw = spec.env && env(spec.env.var);
        if (!spec.env || raw === undefined) return;
        let converted: JsonValue;
        try {
          converted = spec.converter.parse(raw);
        } catch (err) {
          if (err instanceof ConversionError) {
            throw new ParseError(
              this.__('env %s: %s', spec.env.var, err.message)
            );
          }
          throw err;
        }
        config[spec.dest] = spec.repeated ? [converted] : converted;
      }
    });
  }

  #envBoolean(name: string, raw: string): boolean {
    const lower = raw.toLowerCase();
    if (TRUTHY_ENV.includes(lower)) return true;
    if (FALSY_ENV.includes(lower)) return false;
    throw new ParseError(
      this.__("env %s: expected boolean value, got '%s'", name, raw)
    );
  }

  #applyDefaults(config: Config, args: readonly ArgSpec[]): void {
    args.forEach(spec => {
      if (spec.dest in config) return;
      switch (spec.kind) {
        case 'flag':
          config[spec.dest] = false;
          break;
        case 'flag-group':
          config[spec.dest] = clone(spec.defaultValue);
          break;
        case 'option':
        case 'positional':
          // No declared default leaves the key absent
          if (spec.defaultValue !== undefined) {
            config[spec.dest] = clone(spec.defaultValue);
          }
          break;
      }
    });
  }

  #runValidators(config: Config, args: readonly ArgSpec[]): void {
    args.forEach(spec => {
      if (spec.kind !== 'option' && spec.kind !== 'positional') return;
      try {
        spec.validator.check(spec.dest, config[spec.dest]);
      } catch (err) {
        if (err instanceof ValidationError) {
          throw new ParseError(err.message);
        }
        throw err;
      }
    });
  }
}

// ---
// Helper functions
// ---

function isPositional(spec: ArgSpec): spec is PositionalSpec {
  return spec.kind === 'positional';
}

/** Push onto the array at `dest`, creating it on first use */
function append(config: Config, dest: string, value: JsonValue): void {
  const current = config[dest];
  if (Array.isArray(current)) current.push(value);
  else config[dest] = [value];
}

/** Copy spec-owned values so configs never alias the compiled spec */
function clone(value: JsonValue): JsonValue {
  return value !== null && typeof value === 'object'
    ? structuredClone(value)
    : value;
}

/** Create a new object with null prototype */
function nullObj(): Config {
  return Object.create(null);
}
