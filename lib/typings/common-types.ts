import type {EnvLookup} from './model-types.js';

/** Filesystem predicates used by must-exist validators */
export interface FsShim {
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  exists(path: string): boolean;
}

export interface ProcessShim {
  argv(): string[];
  exit(code: number): void;
}

/** Platform specific functions (DI) */
export interface PlatformShim {
  format(format: string, ...params: unknown[]): string;
  getEnv: EnvLookup;
  fs: FsShim;
  process: ProcessShim;
}
