import { serialize, deserialize, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should keep primitives and plain payloads intact', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(null))).toBe(null);
        expect(deserialize(serialize({ prompt: 'hi', tags: ['a', 'b'] }))).toEqual({ prompt: 'hi', tags: ['a', 'b'] });
    });

    test('should restore dates and maps inside a result', () => {
        const finishedAt = new Date('2026-01-02T03:04:05.000Z');
        const output = deserialize(serialize({ finishedAt, counts: new Map([['a', 1]]) }));

        expect(output).toEqual({ finishedAt, counts: new Map([['a', 1]]) });
    });

    test('should enforce the size limit with the value label', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1);
        expect(() => serialize(largeString, 'payload')).toThrow(SerializationError);
        expect(() => serialize(largeString, 'payload')).toThrow(/^payload size exceeds maximum limit of 1\.00MB/);
    });

    test('should honour a custom limit', () => {
        expect(() => serialize('abcdef', 'result', 4)).toThrow(SerializationError);
        expect(serialize('ab', 'result', 20)).toBe('{"json":"ab"}');
    });

    test('should map undefined to null and back', () => {
        expect(serialize(undefined)).toBeNull();
        expect(deserialize(null)).toBeUndefined();
        expect(deserialize('')).toBeUndefined();
    });

    test('should reject malformed input', () => {
        expect(() => deserialize('{not json', 'result')).toThrow(/^Failed to deserialize result/);
    });
});
