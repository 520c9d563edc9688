import {ConversionError} from './cerror.js';
import type {JsonValue, ScalarType, TypeSpec} from './typings/model-types.js';

/** Bidirectional string <-> value conversion for one declared type */
export interface Converter {
  parse(raw: string): JsonValue;
  /** Inverse of `parse`, only given values `parse` could have produced */
  format(value: JsonValue): string;
  /** Placeholder shown in help, e.g. `FILE` */
  docv: string;
}

const DEFAULT_SEPARATOR = ',';

const INT_REGEX = /^-?\d+$/;
const FLOAT_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ---
// Scalars
// ---

function identityConverter(docv: string): Converter {
  return {
    parse: raw => raw,
    format: value => String(value),
    docv,
  };
}

export const stringConverter = (): Converter => identityConverter('STRING');
export const fileConverter = (): Converter => identityConverter('FILE');
export const dirConverter = (): Converter => identityConverter('DIR');
export const pathConverter = (): Converter => identityConverter('PATH');

export function intConverter(): Converter {
  return {
    parse(raw) {
      if (!raw.length) {
        throw new ConversionError('expected integer, got empty string');
      }
      const value = Number(raw);
      if (!INT_REGEX.test(raw) || !Number.isSafeInteger(value)) {
        throw new ConversionError(`expected integer, got '${raw}'`);
      }
      // '-0' parses to -0
      return value === 0 ? 0 : value;
    },
    format: value => String(value),
    docv: 'INT',
  };
}

export function floatConverter(): Converter {
  return {
    parse(raw) {
      if (!raw.length) {
        throw new ConversionError('expected float, got empty string');
      }
      const value = Number(raw);
      if (!FLOAT_REGEX.test(raw) || !Number.isFinite(value)) {
        throw new ConversionError(`expected float, got '${raw}'`);
      }
      return value;
    },
    format: value => String(value),
    docv: 'FLOAT',
  };
}

export function boolConverter(): Converter {
  return {
    parse(raw) {
      const lower = raw.toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
      throw new ConversionError(`expected 'true' or 'false', got '${raw}'`);
    },
    format: value => (value ? 'true' : 'false'),
    docv: 'BOOL',
  };
}

export function enumConverter(choices: readonly string[]): Converter {
  return {
    parse(raw) {
      if (choices.includes(raw)) return raw;
      throw new ConversionError(
        `invalid choice '${raw}', expected one of: ${choices.join(' ')}`
      );
    },
    format: value => String(value),
    docv: 'ENUM',
  };
}

/** Converter for a scalar type; `enum` without choices reads as a string */
export function scalarConverter(type: ScalarType): Converter {
  switch (type) {
    case 'string':
    case 'enum':
      return stringConverter();
    case 'int':
      return intConverter();
    case 'float':
      return floatConverter();
    case 'bool':
      return boolConverter();
    case 'file':
      return fileConverter();
    case 'dir':
      return dirConverter();
    case 'path':
      return pathConverter();
  }
}

// ---
// Compounds
// ---

/** Split on every occurrence of `separator`; an empty string has no parts */
export function split(raw: string, separator: string): string[] {
  if (!raw.length) return [];
  return raw.split(separator);
}

/** Positional element of a converted pair/triple */
function elementAt(value: JsonValue, index: number): JsonValue {
  return Array.isArray(value) ? value[index] : value;
}

export function listConverter(
  element: Converter,
  separator = DEFAULT_SEPARATOR
): Converter {
  return {
    parse: raw => split(raw, separator).map(part => element.parse(part)),
    format: value =>
      (Array.isArray(value) ? value : [value])
        .map(v => element.format(v))
        .join(separator),
    docv: `${element.docv}${separator}...`,
  };
}

export function pairConverter(
  first: Converter,
  second: Converter,
  separator = DEFAULT_SEPARATOR
): Converter {
  return {
    parse(raw) {
      const pos = raw.indexOf(separator);
      if (pos === -1) {
        throw new ConversionError(
          `expected pair separated by '${separator}', got '${raw}'`
        );
      }
      return [
        first.parse(raw.slice(0, pos)),
        second.parse(raw.slice(pos + separator.length)),
      ];
    },
    format: value =>
      [
        first.format(elementAt(value, 0)),
        second.format(elementAt(value, 1)),
      ].join(separator),
    docv: [first.docv, second.docv].join(separator),
  };
}

export function tripleConverter(
  first: Converter,
  second: Converter,
  third: Converter,
  separator = DEFAULT_SEPARATOR
): Converter {
  return {
    parse(raw) {
      const pos1 = raw.indexOf(separator);
      const pos2 =
        pos1 === -1 ? -1 : raw.indexOf(separator, pos1 + separator.length);
      if (pos2 === -1) {
        throw new ConversionError(
          `expected triple separated by '${separator}', got '${raw}'`
        );
      }
      return [
        first.parse(raw.slice(0, pos1)),
        second.parse(raw.slice(pos1 + separator.length, pos2)),
        third.parse(raw.slice(pos2 + separator.length)),
      ];
    },
    format: value =>
      [
        first.format(elementAt(value, 0)),
        second.format(elementAt(value, 1)),
        third.format(elementAt(value, 2)),
      ].join(separator),
    docv: [first.docv, second.docv, third.docv].join(separator),
  };
}

// ---
// Factory
// ---

/** Build the converter for a type spec, binding `choices` to a scalar enum */
export function makeConverter(
  spec: TypeSpec,
  choices?: readonly string[]
): Converter {
  if (typeof spec === 'string') {
    return spec === 'enum' && choices
      ? enumConverter(choices)
      : scalarConverter(spec);
  }
  const separator = spec.separator ?? DEFAULT_SEPARATOR;
  if ('list' in spec) {
    return listConverter(scalarConverter(spec.list), separator);
  }
  if ('pair' in spec) {
    const [a, b] = spec.pair;
    return pairConverter(scalarConverter(a), scalarConverter(b), separator);
  }
  const [a, b, c] = spec.triple;
  return tripleConverter(
    scalarConverter(a),
    scalarConverter(b),
    scalarConverter(c),
    separator
  );
}
