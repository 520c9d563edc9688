import {ValidationError} from './cerror.js';
import type {FsShim} from './typings/common-types.js';
import type {
  JsonValue,
  Option,
  Positional,
  ScalarType,
  TypeSpec,
} from './typings/model-types.js';

export interface Validator {
  /** Throws a `ValidationError`; `value` is `undefined` when absent */
  check(name: string, value: JsonValue | undefined): void;
  description: string;
}

/** Fails iff the value is absent (an explicit `null` is present) */
export function required(): Validator {
  return {
    check(name, value) {
      if (value === undefined) {
        throw new ValidationError(`${name} is required`);
      }
    },
    description: 'required',
  };
}

export function allOf(validators: readonly Validator[]): Validator {
  if (!validators.length) {
    return {check() {}, description: 'none'};
  }
  return {
    check(name, value) {
      for (const v of validators) v.check(name, value);
    },
    description: validators.map(v => v.description).join(' + '),
  };
}

export function isFilesystemType(type: ScalarType): boolean {
  return type === 'file' || type === 'dir' || type === 'path';
}

/** Builds validators whose existence checks go through the given fs shim */
export class ValidatorRegistry {
  readonly fs: FsShim;

  constructor(fs: FsShim) {
    this.fs = fs;
  }

  mustExistFile(): Validator {
    return this.#existence('must_exist(file)', path =>
      this.fs.isFile(path) ? null : 'is not a regular file'
    );
  }

  mustExistDir(): Validator {
    return this.#existence('must_exist(dir)', path =>
      this.fs.isDirectory(path) ? null : 'is not a directory'
    );
  }

  mustExistPath(): Validator {
    return this.#existence('must_exist(path)', path =>
      this.fs.exists(path) ? null : 'does not exist'
    );
  }

  /** Existence check for a scalar, `undefined` for non-filesystem types */
  mustExistForScalar(type: ScalarType): Validator | undefined {
    switch (type) {
      case 'file':
        return this.mustExistFile();
      case 'dir':
        return this.mustExistDir();
      case 'path':
        return this.mustExistPath();
      default:
        return undefined;
    }
  }

  /** Type-aware existence check; `undefined` without a filesystem element */
  mustExistForType(spec: TypeSpec): Validator | undefined {
    if (typeof spec === 'string') return this.mustExistForScalar(spec);
    if ('list' in spec) {
      const inner = this.mustExistForScalar(spec.list);
      return inner && eachOf(inner);
    }
    const [types, description]: [readonly ScalarType[], string] =
      'pair' in spec
        ? [spec.pair, 'must_exist(pair)']
        : [spec.triple, 'must_exist(triple)'];
    if (!types.some(isFilesystemType)) return undefined;
    const components = types.map(t => this.mustExistForScalar(t));
    return {
      check(name, value) {
        if (value === undefined) return;
        const elems = toArray(value);
        components.forEach((v, i) => v?.check(`${name}[${i}]`, elems[i]));
      },
      description,
    };
  }

  fromOption(option: Option): Validator {
    return this.#fromConstraints(option);
  }

  fromPositional(positional: Positional): Validator {
    return this.#fromConstraints(positional);
  }

  #fromConstraints({
    required: isRequired,
    mustExist,
    repeated,
    type,
  }: Pick<
    Option | Positional,
    'required' | 'mustExist' | 'repeated' | 'type'
  >): Validator {
    const parts: Validator[] = [];
    if (isRequired) parts.push(required());
    if (mustExist) {
      const v = this.mustExistForType(type);
      // Repeated arguments hold one value per occurrence
      if (v) parts.push(repeated ? eachOf(v) : v);
    }
    return allOf(parts);
  }

  /** Skips absent and `null` values; reports `<name>: <path> <problem>` */
  #existence(
    description: string,
    problem: (path: string) => string | null
  ): Validator {
    return {
      check(name, value) {
        if (value === undefined || value === null) return;
        const path = String(value);
        const found = problem(path);
        if (found !== null) {
          throw new ValidationError(`${name}: ${path} ${found}`);
        }
      },
      description,
    };
  }
}

/** Applies `inner` to every element, naming each one `name[i]` */
export function eachOf(inner: Validator): Validator {
  return {
    check(name, value) {
      if (value === undefined) return;
      toArray(value).forEach((elem, i) => inner.check(`${name}[${i}]`, elem));
    },
    description: inner.description,
  };
}

function toArray(value: JsonValue): JsonValue[] {
  return Array.isArray(value) ? value : [value];
}
