import {describe, it, expect} from 'vitest';
import {allOf, required, ValidatorRegistry} from '../../lib/validator.js';
import {ValidationError} from '../../lib/cerror.js';
import {createTestShim} from '../test-helpers.js';
import type {Option, Positional} from '../../lib/typings/model-types.js';

const registry = new ValidatorRegistry(
  createTestShim({files: ['/tmp/a.txt', '/tmp/b.txt'], dirs: ['/tmp']}).fs
);

describe('Validators', () => {
  describe('required', () => {
    it('should fail when the value is absent', () => {
      const v = required();
      expect(() => v.check('name', undefined)).toThrow('name is required');
      expect(() => v.check('name', undefined)).toThrow(ValidationError);
    });

    it('should accept an explicit null', () => {
      expect(() => required().check('name', null)).not.toThrow();
    });
  });

  describe('must exist', () => {
    it('should skip absent values', () => {
      const v = registry.mustExistFile();
      expect(() => v.check('input', undefined)).not.toThrow();
    });

    it('should skip null values', () => {
      expect(() => registry.mustExistFile().check('input', null)).not.toThrow();
      expect(() => registry.mustExistDir().check('out', null)).not.toThrow();
    });

    it('should check regular files', () => {
      const v = registry.mustExistFile();
      expect(() => v.check('input', '/tmp/a.txt')).not.toThrow();
      expect(() => registry.mustExistFile().check('input', '/tmp')).toThrow(
        'input: /tmp is not a regular file'
      );
    });

    it('should check directories', () => {
      expect(() => registry.mustExistDir().check('out', '/tmp')).not.toThrow();
      expect(() => registry.mustExistDir().check('out', '/tmp/a.txt')).toThrow(
        'out: /tmp/a.txt is not a directory'
      );
    });

    it('should check generic paths', () => {
      const v = registry.mustExistPath();
      expect(() => v.check('p', '/tmp/b.txt')).not.toThrow();
      expect(() => registry.mustExistPath().check('p', '/nope')).toThrow(
        'p: /nope does not exist'
      );
    });
  });

  describe('allOf', () => {
    it('should be a no-op when empty', () => {
      const v = allOf([]);
      expect(v.description).toBe('none');
      expect(() => v.check('x', undefined)).not.toThrow();
    });

    it('should join descriptions', () => {
      expect(allOf([required(), registry.mustExistFile()]).description).toBe(
        'required + must_exist(file)'
      );
    });

    it('should stop at the first failure', () => {
      const v = allOf([required(), registry.mustExistFile()]);
      expect(() => v.check('input', undefined)).toThrow('input is required');
    });
  });

  describe('mustExistForType', () => {
    it('should produce no validator for non-filesystem types', () => {
      expect(registry.mustExistForType('string')).toBeUndefined();
      expect(registry.mustExistForType({list: 'int'})).toBeUndefined();
      const pair = registry.mustExistForType({pair: ['string', 'int']});
      expect(pair).toBeUndefined();
    });

    it('should tag list elements with their index', () => {
      const v = registry.mustExistForType({list: 'file'});
      expect(v?.description).toBe('must_exist(file)');
      expect(() => v?.check('inputs', ['/tmp/a.txt', '/missing'])).toThrow(
        'inputs[1]: /missing is not a regular file'
      );
    });

    it('should check only filesystem components of a pair', () => {
      const v = registry.mustExistForType({pair: ['string', 'dir']});
      expect(v?.description).toBe('must_exist(pair)');
      expect(() => v?.check('mount', ['/missing', '/tmp'])).not.toThrow();
      expect(() => v?.check('mount', ['/tmp', '/missing'])).toThrow(
        'mount[1]: /missing is not a directory'
      );
    });

    it('should check each filesystem component of a triple', () => {
      const v = registry.mustExistForType({triple: ['file', 'int', 'path']});
      expect(v?.description).toBe('must_exist(triple)');
      expect(() => v?.check('t', ['/tmp/a.txt', 3, '/nope'])).toThrow(
        't[2]: /nope does not exist'
      );
    });
  });

  describe('fromOption / fromPositional', () => {
    it('should compose required and existence checks', () => {
      const option: Option = {
        kind: 'option',
        names: ['config'],
        doc: 'Config file',
        type: 'file',
        required: true,
        mustExist: true,
      };
      const v = registry.fromOption(option);
      expect(v.description).toBe('required + must_exist(file)');
      expect(() => v.check('config', undefined)).toThrow('config is required');
      expect(() => v.check('config', '/missing')).toThrow(
        'config: /missing is not a regular file'
      );
    });

    it('should ignore mustExist on non-filesystem types', () => {
      const positional: Positional = {
        kind: 'positional',
        name: 'count',
        doc: 'How many',
        type: 'int',
        mustExist: true,
      };
      expect(registry.fromPositional(positional).description).toBe('none');
    });

    it('should check each value of a repeated argument', () => {
      const positional: Positional = {
        kind: 'positional',
        name: 'inputs',
        doc: 'Input files',
        type: 'file',
        repeated: true,
        mustExist: true,
      };
      const v = registry.fromPositional(positional);
      expect(v.description).toBe('must_exist(file)');
      const both = ['/tmp/a.txt', '/tmp/b.txt'];
      expect(() => v.check('inputs', both)).not.toThrow();
      expect(() => v.check('inputs', ['/tmp/a.txt', '/tmp'])).toThrow(
        'inputs[1]: /tmp is not a regular file'
      );
    });
  });
});
