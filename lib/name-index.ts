import type {ArgSpec} from './typings/spec-types.js';

export declare type MatchKind = 'flag' | 'option' | 'flag-group';

export interface Match {
  argIndex: number;
  kind: MatchKind;
  /** Entry of a flag group, 0 otherwise */
  entryIndex: number;
}

/** Canonical CLI form of a declared name: `-x` or `--xxx` */
export function cliName(name: string): string {
  return name.length === 1 ? `-${name}` : `--${name}`;
}

/** Lookup from canonical CLI token to the argument of one command level */
export class NameIndex {
  #entries = new Map<string, Match>();

  constructor(args: readonly ArgSpec[] = []) {
    args.forEach((spec, argIndex) => {
      switch (spec.kind) {
        case 'flag':
        case 'option': {
          const kind = spec.kind;
          spec.names.forEach(name =>
            this.insert(cliName(name), {argIndex, kind, entryIndex: 0})
          );
          break;
        }
        case 'flag-group':
          spec.entries.forEach((entry, entryIndex) =>
            entry.names.forEach(name =>
              this.insert(cliName(name), {
                argIndex,
                kind: 'flag-group',
                entryIndex,
              })
            )
          );
          break;
        case 'positional':
          break;
      }
    });
  }

  /** First registration of a name wins */
  insert(name: string, match: Match): void {
    if (!this.#entries.has(name)) this.#entries.set(name, match);
  }

  lookup(name: string): Match | undefined {
    return this.#entries.get(name);
  }
}
