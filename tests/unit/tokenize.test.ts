import {describe, it, expect} from 'vitest';
import {
  classifyToken,
  splitLongOption,
  tokenizeArgString,
} from '../../lib/tokenize.js';
import {NameIndex, cliName} from '../../lib/name-index.js';
import {createTestCmd} from '../test-helpers.js';

describe('Tokenizer', () => {
  describe('classifyToken', () => {
    it('should recognise the terminator', () => {
      expect(classifyToken('--')).toBe('double-dash');
    });

    it('should recognise long options', () => {
      expect(classifyToken('--verbose')).toBe('long-option');
      expect(classifyToken('--a=b')).toBe('long-option');
      expect(classifyToken('---x')).toBe('long-option');
    });

    it('should recognise short groups', () => {
      expect(classifyToken('-v')).toBe('short-group');
      expect(classifyToken('-abc')).toBe('short-group');
    });

    it('should treat everything else as positional', () => {
      expect(classifyToken('-')).toBe('positional');
      expect(classifyToken('')).toBe('positional');
      expect(classifyToken('file.txt')).toBe('positional');
    });
  });

  describe('splitLongOption', () => {
    it('should return the bare name', () => {
      expect(splitLongOption('--name')).toEqual({name: 'name'});
    });

    it('should split on the first equals sign only', () => {
      expect(splitLongOption('--foo=bar=baz')).toEqual({
        name: 'foo',
        value: 'bar=baz',
      });
    });

    it('should keep an empty inline value', () => {
      expect(splitLongOption('--foo=')).toEqual({name: 'foo', value: ''});
    });
  });

  describe('tokenizeArgString', () => {
    it('should copy arrays', () => {
      const input = ['a', 'b'];
      const tokens = tokenizeArgString(input);
      expect(tokens).toEqual(['a', 'b']);
      expect(tokens).not.toBe(input);
    });

    it('should split on runs of spaces', () => {
      expect(tokenizeArgString('  commit  -m   x ')).toEqual([
        'commit',
        '-m',
        'x',
      ]);
    });

    it('should keep quoted text together and drop the quotes', () => {
      expect(tokenizeArgString('-m "initial commit" --name=\'A B\'')).toEqual([
        '-m',
        'initial commit',
        '--name=A B',
      ]);
    });

    it('should keep empty quoted arguments', () => {
      expect(tokenizeArgString('a "" b')).toEqual(['a', '', 'b']);
    });
  });
});

describe('NameIndex', () => {
  const cmd = createTestCmd();
  const args = cmd.compileArgs([
    {kind: 'flag', names: ['v', 'verbose'], doc: 'Verbose'},
    {kind: 'positional', name: 'input', doc: 'Input', type: 'string'},
    {kind: 'option', names: ['o', 'output'], doc: 'Output', type: 'string'},
    {
      kind: 'flag-group',
      dest: 'color',
      doc: 'Color',
      default: 'auto',
      flags: [
        {names: ['color'], doc: 'Always', value: 'always'},
        {names: ['no-color'], doc: 'Never', value: 'never'},
      ],
    },
  ]);
  const index = new NameIndex(args);

  it('should map names to their canonical CLI form', () => {
    expect(cliName('v')).toBe('-v');
    expect(cliName('verbose')).toBe('--verbose');
  });

  it('should index flags and options under every name', () => {
    const verbose = {argIndex: 0, kind: 'flag', entryIndex: 0};
    expect(index.lookup('-v')).toEqual(verbose);
    expect(index.lookup('--verbose')).toEqual(verbose);
    expect(index.lookup('-o')).toEqual({
      argIndex: 2,
      kind: 'option',
      entryIndex: 0,
    });
  });

  it('should index flag group entries by entry', () => {
    expect(index.lookup('--no-color')).toEqual({
      argIndex: 3,
      kind: 'flag-group',
      entryIndex: 1,
    });
  });

  it('should not index positionals or mismatched forms', () => {
    expect(index.lookup('--input')).toBeUndefined();
    expect(index.lookup('--v')).toBeUndefined();
  });
});
