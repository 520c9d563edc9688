import {existsSync, statSync} from 'node:fs';
import {format} from 'node:util';
import type {PlatformShim} from '../typings/common-types.js';

function stat(path: string) {
  return statSync(path, {throwIfNoEntry: false});
}

// Binds cmdschema to Node.js standard libraries:
const nodePlatformShim: PlatformShim = {
  format,
  getEnv: (name: string) => process.env[name],
  fs: {
    isFile: path => stat(path)?.isFile() ?? false,
    isDirectory: path => stat(path)?.isDirectory() ?? false,
    exists: path => existsSync(path),
  },
  process: {
    argv: () => process.argv,
    exit: code => process.exit(code),
  },
};

export default nodePlatformShim;
