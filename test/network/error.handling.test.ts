import { AnnError, isAnnError } from '../../src/errors';
import { config } from '../../src/config';
import { warn, warnOnce } from '../../src/utils/warn';

describe('Error handling', () => {
  describe('AnnError', () => {
    const err = new AnnError('IndexOutOfRange', 'connection 0 (0 -> 9) is outside [0, 2)');
    it('is an Error', () => {
      expect(err).toBeInstanceOf(Error);
    });
    it('carries its name, code and message', () => {
      expect([err.name, err.code, err.message]).toEqual([
        'AnnError',
        'IndexOutOfRange',
        'connection 0 (0 -> 9) is outside [0, 2)',
      ]);
    });
    it('has no cause unless one is given', () => {
      expect(err.cause).toBeUndefined();
    });
    it('keeps a given cause', () => {
      // Arrange
      const inner = new Error('disk full');
      // Act
      const wrapped = new AnnError('FileWriteError', 'could not write network to out.ann', inner);
      // Assert
      expect(wrapped.cause).toBe(inner);
    });
  });

  describe('isAnnError()', () => {
    it('accepts any AnnError without a code filter', () => {
      expect(isAnnError(new AnnError('UnknownHandle', 'x'))).toBe(true);
    });
    it('matches the requested code only', () => {
      // Arrange
      const err = new AnnError('InvalidRange', 'x');
      // Act & Assert
      expect([isAnnError(err, 'InvalidRange'), isAnnError(err, 'MalformedFile')]).toEqual([
        true,
        false,
      ]);
    });
    it('rejects plain errors and non-errors', () => {
      expect([isAnnError(new Error('x')), isAnnError('InvalidRange'), isAnnError(null)]).toEqual([
        false,
        false,
        false,
      ]);
    });
  });

  describe('warnings', () => {
    let warnSpy: jest.SpyInstance;
    beforeEach(() => {
      warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });
    afterEach(() => {
      config.warnings = false;
      jest.restoreAllMocks();
    });

    it('stays silent while config.warnings is off', () => {
      // Act
      warn('quiet');
      // Assert
      expect(warnSpy).not.toHaveBeenCalled();
    });
    it('writes through console.warn when enabled', () => {
      // Arrange
      config.warnings = true;
      // Act
      warn('loud');
      // Assert
      expect(warnSpy).toHaveBeenCalledWith('loud');
    });
    it('reports a warnOnce key a single time', () => {
      // Arrange
      config.warnings = true;
      // Act
      warnOnce('error-handling:once', 'first');
      warnOnce('error-handling:once', 'second');
      // Assert
      expect(warnSpy.mock.calls).toEqual([['first']]);
    });
  });
});
