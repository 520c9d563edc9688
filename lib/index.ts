// Bootstraps cmdschema for Node.js:
import {CmdFactory} from './cmd-factory.js';
import nodePlatformShim from './platform-shims/node.js';

const cmd = CmdFactory(nodePlatformShim);

export const {compile, compileArgs, parse, run} = cmd;

export {CmdFactory, nodePlatformShim};
export type {CmdInstance} from './cmd-factory.js';
export {
  CError,
  ConversionError,
  ParseError,
  ValidationError,
} from './cerror.js';
export {
  boolConverter,
  dirConverter,
  enumConverter,
  fileConverter,
  floatConverter,
  intConverter,
  listConverter,
  makeConverter,
  pairConverter,
  pathConverter,
  scalarConverter,
  stringConverter,
  tripleConverter,
} from './converter.js';
export type {Converter} from './converter.js';
export {allOf, eachOf, required, ValidatorRegistry} from './validator.js';
export type {Validator} from './validator.js';
export {resolveDest, resolveEnv} from './arg-spec.js';
export {classifyToken, splitLongOption, tokenizeArgString} from './tokenize.js';
export {createLogger} from './run.js';
export type {LoggerInstance, MainFunction, RunOptions} from './run.js';
export {manText, usageText} from './usage.js';
export type {UsageRenderer} from './usage.js';
export type * from './typings/model-types.js';
export type * from './typings/spec-types.js';
export type {
  FsShim,
  PlatformShim,
  ProcessShim,
} from './typings/common-types.js';
