/**
 * Tests for HTTP header and request path helpers
 */

import { describe, it, expect } from 'vitest';

import {
    decodePath,
    isValidHeaderName,
    isValidHeaderValue,
    withIndexDocument,
} from '../src/http/header.js';

describe('decodePath', () => {
    it('should decode unreserved characters', () => {
        expect(decodePath('/%5Fheaders')).toBe('/_headers');
        expect(decodePath('/caf%C3%A9.html')).toBe('/café.html');
    });

    it('should keep reserved characters encoded', () => {
        expect(decodePath('/a%2Fb')).toBe('/a%2Fb');
        expect(decodePath('/q%3Fx')).toBe('/q%3Fx');
    });

    it('should return malformed input unchanged', () => {
        expect(decodePath('/bad%E0%A4%A')).toBe('/bad%E0%A4%A');
    });
});

describe('isValidHeaderName', () => {
    it('should accept tokens and reject separators', () => {
        expect(isValidHeaderName('X-Frame-Options')).toBe(true);
        expect(isValidHeaderName('X Frame')).toBe(false);
        expect(isValidHeaderName('')).toBe(false);
    });
});

describe('isValidHeaderValue', () => {
    it('should reject control characters and code points above 0xFF', () => {
        expect(isValidHeaderValue('public,\tmax-age=60')).toBe(true);
        expect(isValidHeaderValue('a\r\nb')).toBe(false);
        expect(isValidHeaderValue('ā')).toBe(false);
    });
});

describe('withIndexDocument', () => {
    it('should append index.html to directory paths only', () => {
        expect(withIndexDocument('/docs/')).toBe('/docs/index.html');
        expect(withIndexDocument('/app.js')).toBe('/app.js');
    });
});
