import { describe, it, expect } from 'vitest';
import { parseLine } from './index.js';

describe('parseLine', () => {
    const full = '172.18.0.1 - - [18/Oct/2026:10:00:00 +0000] "GET /version HTTP/1.1" 200 '
        + 'pool:blue release:blue-v1.0.0 upstream_status:200 upstream_addr:172.18.0.3:3000 '
        + 'request_time:0.004 upstream_response_time:0.003';

    it('should extract all six fields from a complete line', () => {
        expect(parseLine(full)).toEqual({
            pool: 'blue',
            release: 'blue-v1.0.0',
            upstreamStatus: '200',
            upstreamAddr: '172.18.0.3:3000',
            requestTime: '0.004',
            upstreamResponseTime: '0.003',
        });
    });

    it('should return null when no field is present', () => {
        expect(parseLine('GET / HTTP/1.1 200')).toBeNull();
        expect(parseLine('')).toBeNull();
    });

    it('should return only the fields that are present', () => {
        const record = parseLine('upstream_status:502 pool:green');

        expect(record).toEqual({ pool: 'green', upstreamStatus: '502' });
        expect(record).not.toHaveProperty('release');
    });

    it('should not depend on field order', () => {
        expect(parseLine('release:r2 upstream_addr:10.0.0.2:80 pool:green')).toEqual({
            pool: 'green',
            release: 'r2',
            upstreamAddr: '10.0.0.2:80',
        });
    });

    it('should keep multi-value fields up to the next marker', () => {
        const record = parseLine(
            'pool:blue upstream_status:502, 200 upstream_addr:10.0.0.1:80, 10.0.0.2:80 request_time:1.2'
        );

        expect(record).toEqual({
            pool: 'blue',
            upstreamStatus: '502, 200',
            upstreamAddr: '10.0.0.1:80, 10.0.0.2:80',
            requestTime: '1.2',
        });
    });

    it('should trim values and ignore a trailing carriage return', () => {
        expect(parseLine('pool:blue   upstream_status:200  \r')).toEqual({
            pool: 'blue',
            upstreamStatus: '200',
        });
    });

    it('should stop a value at an unrecognised marker', () => {
        expect(parseLine('pool:blue host:example.com')).toEqual({ pool: 'blue' });
    });

    it('should not confuse upstream_response_time with request_time', () => {
        expect(parseLine('upstream_response_time:0.010')).toEqual({ upstreamResponseTime: '0.010' });
    });

    it('should only match markers at a word start', () => {
        expect(parseLine('xpool:blue')).toBeNull();
    });

    it('should record an empty value as present', () => {
        expect(parseLine('pool: release:r1')).toEqual({ pool: '', release: 'r1' });
    });

    it('should parse a line with a long whitespace run in linear time', () => {
        const gap = ' '.repeat(20000);
        const started = performance.now();
        const record = parseLine(`pool:blue ${gap}x upstream_status:500`);
        const elapsed = performance.now() - started;

        expect(record).toEqual({ pool: `blue ${gap}x`, upstreamStatus: '500' });
        expect(elapsed).toBeLessThan(50);
    });

    it('should never throw on arbitrary input', () => {
        const inputs = [':::', 'pool', 'pool:', '\u0000￿', 'a'.repeat(5000), 'pool:\t\t'];

        for (const input of inputs) {
            expect(() => parseLine(input)).not.toThrow();
        }
    });
});
