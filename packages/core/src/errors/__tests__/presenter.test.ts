import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../../errors/presenter';
import { ErrorCode } from '../../errors/codes';
import {
  ConfigError,
  GenerationError,
  InternalError,
  OutputError,
  isPubgenError,
} from '../../types/errors';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('CLI view shows the setting and offending value', () => {
    const err = new ConfigError({
      message: 'Unsupported size: 2mb',
      errorCode: ErrorCode.UNKNOWN_SIZE_TIER,
      context: { setting: 'size', value: '2mb', suggestion: 'Use 1mb' },
    });
    const view = new ErrorPresenter('dev', { terminalWidth: 100 }).formatForCLI(
      err
    );
    expect(view).toEqual({
      code: ErrorCode.UNKNOWN_SIZE_TIER,
      message: 'Unsupported size: 2mb',
      setting: { name: 'size', value: '"2mb"' },
      file: undefined,
      hint: 'Use 1mb',
      cause: undefined,
      colors: true,
      terminalWidth: 100,
    });
  });

  test('CLI view omits the setting when no value was recorded', () => {
    const err = new GenerationError({
      message: 'Cannot synthesize text from an empty vocabulary',
      context: { setting: 'terms' },
    });
    expect(new ErrorPresenter('dev').formatForCLI(err).setting).toBeUndefined();
  });

  test('CLI view includes the path and cause of output errors in dev only', () => {
    const err = new OutputError({
      message: 'Failed to write out.json',
      context: { path: '/tmp/out.json' },
      cause: new Error('EACCES: permission denied'),
    });
    const dev = new ErrorPresenter('dev').formatForCLI(err);
    expect(dev.file).toBe('/tmp/out.json');
    expect(dev.cause).toBe('EACCES: permission denied');

    const prod = new ErrorPresenter('prod').formatForCLI(err);
    expect(prod.cause).toBeUndefined();
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new InternalError('boom');
    process.env.NO_COLOR = '1';
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(err).colors).toBe(
      false
    );
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(new ErrorPresenter('prod', { colors: false }).formatForCLI(err).colors).toBe(
      true
    );
  });
});

describe('PubgenError', () => {
  test('subclasses carry their name, code and exit code', () => {
    const err = new OutputError({ message: 'nope', context: { path: '/x' } });
    expect(err).toBeInstanceOf(Error);
    expect(isPubgenError(err)).toBe(true);
    expect(err.name).toBe('OutputError');
    expect(err.errorCode).toBe(ErrorCode.OUTPUT_WRITE_FAILED);
    expect(err.context?.path).toBe('/x');
    expect(err.getExitCode()).toBe(60);
  });

  test('InternalError keeps the wrapped cause', () => {
    const cause = new Error('underlying');
    const err = new InternalError('wrapped', cause);
    expect(err.cause).toBe(cause);
    expect(new ErrorPresenter('dev').formatForCLI(err).cause).toBe('underlying');
  });

  test('plain errors are not PubgenErrors', () => {
    expect(isPubgenError(new Error('plain'))).toBe(false);
  });
});
