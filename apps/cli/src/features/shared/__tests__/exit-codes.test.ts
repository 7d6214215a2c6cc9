import { ConfigValidationError } from '@pacer/progress';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { exitCodeForError, ExitCodes, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define SUCCESS as 0', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
    });

    it('should define error codes', () => {
      expect(ExitCodes.GENERAL_ERROR).toBe(1);
      expect(ExitCodes.INVALID_ARGS).toBe(2);
      expect(ExitCodes.CONFIG_ERROR).toBe(11);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(new Set(codes).size).toBe(codes.length);
    });
  });

  describe('exitCodeForError', () => {
    it('should map settings errors to CONFIG_ERROR', () => {
      expect(exitCodeForError(new ConfigValidationError([]))).toBe(ExitCodes.CONFIG_ERROR);
    });

    it('should map other errors to INVALID_ARGS', () => {
      expect(exitCodeForError(new Error('Invalid workers value: "0". Must be a positive integer.'))).toBe(
        ExitCodes.INVALID_ARGS
      );
    });
  });

  describe('exitWithCode', () => {
    let processExitSpy: MockInstance<typeof process.exit>;

    beforeEach(() => {
      processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
    });

    afterEach(() => {
      processExitSpy.mockRestore();
    });

    it('should call process.exit with the provided code', () => {
      expect(() => exitWithCode(ExitCodes.GENERAL_ERROR)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should call process.exit with SUCCESS code', () => {
      expect(() => exitWithCode(ExitCodes.SUCCESS)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(0);
    });
  });
});
