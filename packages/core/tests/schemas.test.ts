import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  TraceError,
  UsageError,
  cellwiseLoggerOptionsSchema,
  dumpOptionsSchema,
  expressionLoggerOptionsSchema,
  parseOptions,
  simpleLoggerOptionsSchema,
} from '../src/index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('parseOptions', () => {
  it('applies defaults', () => {
    expect(parseOptions(simpleLoggerOptionsSchema, undefined, 'SimpleLogger')).toEqual({ verbose: true });
    expect(parseOptions(dumpOptionsSchema, {}, 'dumpLog')).toEqual({
      append: false,
      delimiter: ',',
      stop: false,
    });
  });

  it('reports a missing key column as MISSING_OPTION', () => {
    const err = captureError(() => parseOptions(cellwiseLoggerOptionsSchema, {}, 'CellwiseLogger'));

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toBeInstanceOf(TraceError);
    expect(err).toMatchObject({
      code: 'MISSING_OPTION',
      name: 'ConfigurationError',
      suggestion: "Provide 'key'.",
    });
  });

  it('reports values of the wrong type as INVALID_OPTIONS', () => {
    const err = captureError(() => parseOptions(cellwiseLoggerOptionsSchema, { key: 5 }, 'CellwiseLogger'));
    expect(err).toMatchObject({ code: 'INVALID_OPTIONS' });
  });

  it('rejects key columns that clash with the cellwise log header', () => {
    for (const key of ['step', 'column', 'old', 'new']) {
      const err = captureError(() => parseOptions(cellwiseLoggerOptionsSchema, { key }, 'CellwiseLogger'));
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ code: 'INVALID_OPTIONS' });
    }
  });

  it('rejects multi-character delimiters', () => {
    const err = captureError(() => parseOptions(dumpOptionsSchema, { delimiter: ';;' }, 'dumpLog'));
    expect(err).toMatchObject({ code: 'INVALID_OPTIONS' });
  });

  it('requires at least one probe', () => {
    const err = captureError(() =>
      parseOptions(expressionLoggerOptionsSchema, { probes: {} }, 'ExpressionLogger')
    );
    expect(err).toMatchObject({ code: 'INVALID_OPTIONS' });
  });

  it('keeps the ignore list of the cellwise logger', () => {
    expect(
      parseOptions(cellwiseLoggerOptionsSchema, { key: 'id', ignore: ['updated'] }, 'CellwiseLogger')
    ).toEqual({ key: 'id', ignore: ['updated'], verbose: true });
  });
});

describe('TraceError', () => {
  it('formats an actionable message', () => {
    const err = new UsageError({
      code: 'NO_LOGGER_ATTACHED',
      message: 'dumpLog called on data without an attached logger',
      suggestion: 'Attach a logger with startLog first.',
    });

    expect(err.name).toBe('UsageError');
    expect(err.toActionableMessage()).toBe(
      'Error [NO_LOGGER_ATTACHED]: dumpLog called on data without an attached logger\n' +
        'Suggested action: Attach a logger with startLog first.'
    );
    expect(err.toJSON()).toEqual({
      name: 'UsageError',
      code: 'NO_LOGGER_ATTACHED',
      message: 'dumpLog called on data without an attached logger',
      suggestion: 'Attach a logger with startLog first.',
      context: undefined,
    });
  });
});
