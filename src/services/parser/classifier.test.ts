import { describe, it, expect } from 'vitest';
import { isServerError } from './classifier.js';

describe('isServerError', () => {
    it('should flag a single 5xx code', () => {
        expect(isServerError('500')).toBe(true);
        expect(isServerError('503')).toBe(true);
        expect(isServerError('599')).toBe(true);
    });

    it('should not flag non-5xx codes', () => {
        expect(isServerError('200')).toBe(false);
        expect(isServerError('404')).toBe(false);
        expect(isServerError('600')).toBe(false);
        expect(isServerError('499')).toBe(false);
    });

    it('should flag a multi-value field when any code is a 5xx', () => {
        expect(isServerError('500, 304')).toBe(true);
        expect(isServerError('200 : 502')).toBe(true);
    });

    it('should not flag a multi-value field without a 5xx', () => {
        expect(isServerError('304,200')).toBe(false);
    });

    it('should treat empty and non-numeric input as no error', () => {
        expect(isServerError('')).toBe(false);
        expect(isServerError(undefined)).toBe(false);
        expect(isServerError('abc')).toBe(false);
        expect(isServerError('-')).toBe(false);
    });

    it('should skip tokens that are not three digits', () => {
        expect(isServerError('5000')).toBe(false);
        expect(isServerError('50')).toBe(false);
        expect(isServerError('5000, 502')).toBe(true);
    });

    it('should read codes embedded in other text', () => {
        expect(isServerError('code=502')).toBe(true);
        expect(isServerError('5x0')).toBe(false);
    });
});
