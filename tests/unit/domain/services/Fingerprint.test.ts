import { computeFingerprint, normalizeText, stableStringify } from '../../../../src/domain/services/Fingerprint';

describe('Fingerprint', () => {
    describe('stableStringify', () => {
        it('should sort keys and drop undefined members', () => {
            expect(stableStringify({ b: 1, a: [true, null], c: undefined })).toBe('{"a":[true,null],"b":1}');
        });

        it('should serialize nested objects the same regardless of key order', () => {
            expect(stableStringify({ x: { b: 2, a: 1 } })).toBe(stableStringify({ x: { a: 1, b: 2 } }));
        });
    });

    describe('computeFingerprint', () => {
        it('should be a 64 character hex digest', () => {
            expect(computeFingerprint('script', { prompt: 'cats' })).toMatch(/^[0-9a-f]{64}$/);
        });

        it('should be stable for equal inputs', () => {
            expect(computeFingerprint('script', { a: 1, b: 'x' })).toBe(computeFingerprint('script', { b: 'x', a: 1 }));
        });

        it('should change with the stage, inputs or version', () => {
            const base = computeFingerprint('script', { prompt: 'cats' });

            expect(computeFingerprint('narration', { prompt: 'cats' })).not.toBe(base);
            expect(computeFingerprint('script', { prompt: 'dogs' })).not.toBe(base);
            expect(computeFingerprint('script', { prompt: 'cats' }, 'reel-pipeline/2')).not.toBe(base);
        });
    });

    describe('normalizeText', () => {
        it('should collapse whitespace', () => {
            expect(normalizeText('  why   octopuses\nhave  hearts ')).toBe('why octopuses have hearts');
        });
    });
});
