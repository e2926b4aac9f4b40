import { parseCliArgs } from '../../../src/presentation/cli/args';

describe('parseCliArgs', () => {
    it('should read options and positional files', () => {
        expect(parseCliArgs(['--api-key', 'test-secret', '-l', 'es', 'a.wav', 'b.mp3'])).toEqual({
            apiKey: 'test-secret',
            language: 'es',
            output: undefined,
            help: false,
            files: ['a.wav', 'b.mp3'],
        });
    });

    it('should accept inline option values', () => {
        const options = parseCliArgs(['--output=all.txt', 'a.wav']);

        expect(options.output).toBe('all.txt');
        expect(options.files).toEqual(['a.wav']);
    });

    it('should default to interactive mode without files', () => {
        expect(parseCliArgs([]).files).toEqual([]);
    });

    it('should reject unknown options', () => {
        expect(() => parseCliArgs(['--bogus'])).toThrow();
    });
});
