import { describe, it, expect } from 'vitest';
import { canonicalize, hostOf, sameHost, isHttpUrl } from '../storage/canonicalize.js';

describe('canonicalize', () => {
    it('should lowercase scheme and host, sort the query, drop fragment and trailing slash', () => {
        expect(canonicalize('HTTPS://Portal.Example.ORG/en/publications/Deep-Nets/?b=2&a=1#abstract')).toBe(
            'https://portal.example.org/en/publications/Deep-Nets?a=1&b=2'
        );
    });

    it('should keep path case', () => {
        expect(canonicalize('https://portal.example.org/en/Persons/Ada')).toBe(
            'https://portal.example.org/en/Persons/Ada'
        );
    });

    it('should map URL variants of one page to the same key', () => {
        const variants = [
            'https://portal.example.org/en/publications/x?lang=en&page=2',
            'https://PORTAL.example.org/en/publications/x/?page=2&lang=en',
            'https://portal.example.org/en/publications/x?page=2&lang=en#top',
            '  https://portal.example.org:443/en/publications/x/?lang=en&page=2  ',
        ];
        const keys = new Set(variants.map(canonicalize));
        expect(keys.size).toBe(1);
    });

    it('should keep the root path slash', () => {
        expect(canonicalize('https://portal.example.org')).toBe('https://portal.example.org/');
        expect(canonicalize('https://portal.example.org/')).toBe('https://portal.example.org/');
    });

    it('should be idempotent', () => {
        const once = canonicalize('http://Portal.example.org/a/b/?z=1&y=2#f');
        expect(canonicalize(once)).toBe(once);
    });

    it('should fall back to trimmed lowercase text for malformed input', () => {
        expect(canonicalize('  Not A URL/ ')).toBe('not a url');
        expect(canonicalize('/en/Publications/X/')).toBe('/en/publications/x');
    });

    it('should return empty string for empty input', () => {
        expect(canonicalize('')).toBe('');
        expect(canonicalize('   ')).toBe('');
    });
});

describe('host helpers', () => {
    it('should compare hosts including port', () => {
        expect(sameHost('https://portal.example.org/a', 'http://PORTAL.example.org/b')).toBe(true);
        expect(sameHost('https://portal.example.org/a', 'https://portal.example.org:8443/a')).toBe(false);
        expect(sameHost('https://portal.example.org/a', 'https://other.example.org/a')).toBe(false);
    });

    it('should treat malformed URLs as different hosts', () => {
        expect(sameHost('not a url', 'not a url')).toBe(false);
        expect(hostOf('not a url')).toBeNull();
    });

    it('should accept only http(s) URLs', () => {
        expect(isHttpUrl('https://portal.example.org/')).toBe(true);
        expect(isHttpUrl('http://portal.example.org/')).toBe(true);
        expect(isHttpUrl('mailto:someone@example.org')).toBe(false);
        expect(isHttpUrl('javascript:void(0)')).toBe(false);
        expect(isHttpUrl('/relative/path')).toBe(false);
    });
});
