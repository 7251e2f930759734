import { describe, expect, test } from 'vitest';

import {
  DocumentLoadError,
  DocumentSaveError,
  InvalidPageGeometryError,
  ReportProcessingError,
  StageError,
} from './report-processing-error';

describe('ReportProcessingError', () => {
  test('should extract messages from errors and other values', () => {
    expect(ReportProcessingError.getErrorMessage(new Error('boom'))).toBe(
      'boom',
    );
    expect(ReportProcessingError.getErrorMessage('plain')).toBe('plain');
    expect(ReportProcessingError.getErrorMessage(42)).toBe('42');
  });

  test('fromError should prefix the context and keep the cause', () => {
    const cause = new Error('EACCES');

    const error = ReportProcessingError.fromError('Failed to read x', cause);

    expect(error).toBeInstanceOf(ReportProcessingError);
    expect(error.message).toBe('Failed to read x: EACCES');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('ReportProcessingError');
  });
});

describe('DocumentLoadError and DocumentSaveError', () => {
  test('should carry the path and a prefixed message', () => {
    const load = new DocumentLoadError('in/report.json', 'not JSON');
    const save = new DocumentSaveError('out/report.json', 'EROFS');

    expect(load).toBeInstanceOf(ReportProcessingError);
    expect(load).toMatchObject({
      name: 'DocumentLoadError',
      path: 'in/report.json',
      message: 'Failed to load document in/report.json: not JSON',
    });
    expect(save).toMatchObject({
      name: 'DocumentSaveError',
      path: 'out/report.json',
      message: 'Failed to save document out/report.json: EROFS',
    });
  });
});

describe('InvalidPageGeometryError', () => {
  test('should report the computed width', () => {
    const error = new InvalidPageGeometryError(-500);

    expect(error.usableWidth).toBe(-500);
    expect(error.message).toBe(
      'Usable content width must be positive, got -500 EMU',
    );
  });
});

describe('StageError', () => {
  test('should format stage and target', () => {
    expect(new StageError('classify-style', 'table 3', 'bad').message).toBe(
      '[classify-style] table 3: bad',
    );
    expect(new StageError('formatting', undefined, 'bad').message).toBe(
      '[formatting] bad',
    );
  });

  test('wrap should keep the original error as cause', () => {
    const cause = new TypeError('undefined is not a function');

    const error = StageError.wrap('image-autofit', 'image 2', cause);

    expect(error).toMatchObject({
      stage: 'image-autofit',
      target: 'image 2',
      message: '[image-autofit] image 2: undefined is not a function',
    });
    expect(error.cause).toBe(cause);
  });

  test('wrap should return an existing StageError unchanged', () => {
    const inner = new StageError('classify-style', 'table 1', 'bad');

    expect(StageError.wrap('classify-style', 'table 9', inner)).toBe(inner);
  });
});
