import {describe, it, expect, vi} from 'vitest';
import {CmdFactory} from '../../lib/cmd-factory.js';
import {createLogger} from '../../lib/run.js';
import {manText, usageText} from '../../lib/usage.js';
import {createTestShim, envLookup, gitSchema, noEnv} from '../test-helpers.js';

function setup(argv?: string[]) {
  const shim = createTestShim({argv});
  const logger = createLogger(false);
  return {shim, logger, cmd: CmdFactory(shim)};
}

describe('createLogger', () => {
  it('should keep one line per call', () => {
    const logger = createLogger(false);
    logger.log('a', 1);
    logger.error('b');
    expect(logger.getOutput()).toBe('a 1\nb');
  });

  it('should echo to the console when asked', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger();
    logger.error('oops');
    expect(spy).toHaveBeenCalledWith('oops');
    spy.mockRestore();
  });
});

describe('CmdRunner', () => {
  it('should pass config and command path to main', () => {
    const {cmd, logger} = setup();
    const main = vi.fn(() => 3);
    const code = cmd.run(gitSchema, main, {
      args: ['commit', '-a'],
      env: noEnv,
      logger,
    });
    expect(code).toBe(3);
    expect(main).toHaveBeenCalledWith({all: true, verbose: false}, ['commit']);
    expect(logger.getOutput()).toBe('');
  });

  it('should treat a missing exit code as success', () => {
    const {cmd, logger} = setup();
    const options = {args: [], env: noEnv, logger};
    expect(cmd.run(gitSchema, () => {}, options)).toBe(0);
  });

  it('should resolve the exit code of an async main', async () => {
    const {cmd, logger} = setup();
    const options = {args: [], env: noEnv, logger};
    const code = cmd.run(gitSchema, async () => 5, options);
    await expect(code).resolves.toBe(5);
  });

  it('should read the process arguments by default', () => {
    const {cmd, logger} = setup(['node', 'git', 'add', 'x.txt']);
    const main = vi.fn();
    cmd.run(gitSchema, main, {env: envLookup({GIT_VERBOSE: '1'}), logger});
    expect(main).toHaveBeenCalledWith(
      {verbose: true, paths: ['x.txt']},
      ['add']
    );
  });

  it('should print the version', () => {
    const {cmd, logger} = setup();
    const main = vi.fn();
    expect(cmd.run(gitSchema, main, {args: ['--version'], logger})).toBe(0);
    expect(logger.getOutput()).toBe('git version 2.40.0');
    expect(main).not.toHaveBeenCalled();
  });

  it('should print help for the requested command', () => {
    const {cmd, logger} = setup();
    const options = {args: ['commit', '--help'], logger};
    expect(cmd.run(gitSchema, vi.fn(), options)).toBe(0);
    const help = usageText(gitSchema, ['commit']).trimEnd();
    expect(logger.getOutput()).toBe(help);
  });

  it('should print the man page', () => {
    const {cmd, logger} = setup();
    const options = {args: ['--help-man'], logger};
    expect(cmd.run(gitSchema, vi.fn(), options)).toBe(0);
    expect(logger.getOutput()).toBe(manText(gitSchema, []).trimEnd());
  });

  it('should accept custom renderers', () => {
    const {cmd, logger} = setup();
    const renderHelp = vi.fn(() => 'custom help\n');
    const options = {args: ['config', '--help'], logger, renderHelp};
    cmd.run(gitSchema, vi.fn(), options);
    expect(renderHelp).toHaveBeenCalledWith(gitSchema, ['config']);
    expect(logger.getOutput()).toBe('custom help');
  });

  it('should report parse errors with usage and exit 1', () => {
    const {cmd, logger} = setup();
    const main = vi.fn();
    const options = {args: ['--bogus'], env: noEnv, logger};
    expect(cmd.run(gitSchema, main, options)).toBe(1);
    expect(logger.getOutput()).toBe(
      'git: unknown option: --bogus\n' + usageText(gitSchema, []).trimEnd()
    );
    expect(main).not.toHaveBeenCalled();
  });

  it('should exit the process when asked', () => {
    const {cmd, logger, shim} = setup();
    const options = {env: noEnv, logger, exitProcess: true};
    cmd.run(gitSchema, () => 2, {...options, args: []});
    cmd.run(gitSchema, vi.fn(), {...options, args: ['push']});
    expect(shim.exits).toEqual([2, 1]);
  });

  it('should not exit the process by default', () => {
    const {cmd, logger, shim} = setup();
    cmd.run(gitSchema, () => 2, {args: [], env: noEnv, logger});
    expect(shim.exits).toEqual([]);
  });

  it('should propagate errors thrown by main', () => {
    const {cmd, logger} = setup();
    const main = () => {
      throw new Error('boom');
    };
    const options = {args: [], env: noEnv, logger};
    expect(() => cmd.run(gitSchema, main, options)).toThrow('boom');
  });
});
