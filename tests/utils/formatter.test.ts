/**
 * Tests for formatter
 */
import { describe, it, expect } from 'vitest';
import { formatDuration, toCsv, truncate } from '../../src/utils/formatter.js';

describe('formatter', () => {
    describe('toCsv', () => {
        it('should write a header and one line per row', () => {
            expect(
                toCsv(
                    ['id', 'name', 'score'],
                    [
                        { id: 'a', name: 'Alpha', score: 1.5 },
                        { id: 'b', name: 'Beta', score: 0 },
                    ],
                ),
            ).toBe('id,name,score\na,Alpha,1.5\nb,Beta,0\n');
        });

        it('should quote cells containing commas, quotes or newlines', () => {
            expect(toCsv(['v'], [{ v: 'a, b' }, { v: 'say "hi"' }, { v: 'two\nlines' }])).toBe(
                'v\n"a, b"\n"say ""hi"""\n"two\nlines"\n',
            );
        });

        it('should leave nullish cells empty and print booleans', () => {
            expect(toCsv(['a', 'b', 'c'], [{ a: null, b: undefined, c: false }])).toBe('a,b,c\n,,false\n');
        });

        it('should write only the header for no rows', () => {
            expect(toCsv(['a', 'b'], [])).toBe('a,b\n');
        });
    });

    describe('formatDuration', () => {
        it('should format milliseconds as m:ss', () => {
            expect(formatDuration(200000)).toBe('3:20');
            expect(formatDuration(61000)).toBe('1:01');
            expect(formatDuration(0)).toBe('0:00');
        });
    });

    describe('truncate', () => {
        it('should shorten long text with an ellipsis', () => {
            expect(truncate('Hello world', 5)).toBe('Hell…');
            expect(truncate('Hi', 5)).toBe('Hi');
        });
    });
});
