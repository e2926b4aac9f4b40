import { loadConfig, validateConfig } from '../../src/config/index';

const CONFIG_KEYS = [
    'OPENAI_API_KEY',
    'OPENAI_BASE_URL',
    'TRANSCRIPTION_MODEL',
    'TRANSCRIPTION_TIMEOUT_MS',
    'DEFAULT_LANGUAGE',
    'MAX_FILE_SIZE_MB',
    'SUPPORTED_FORMATS',
    'OUTPUT_DIRECTORY',
    'AUTO_SAVE_TRANSCRIPTS',
    'TRANSCRIPT_FILE_SUFFIX',
    'SHOW_PROGRESS',
    'USE_EMOJIS',
];

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        CONFIG_KEYS.forEach((key) => delete process.env[key]);
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should fall back to defaults', () => {
        const config = loadConfig();

        expect(config.apiKey).toBe('');
        expect(config.apiBaseUrl).toBe('https://api.openai.com');
        expect(config.transcriptionModel).toBe('whisper-1');
        expect(config.defaultLanguage).toBe('en');
        expect(config.maxFileSizeBytes).toBe(25 * 1024 * 1024);
        expect(Array.from(config.supportedExtensions)).toEqual(['.mp3', '.mp4', '.mpeg', '.mpga', '.m4a', '.wav', '.webm']);
        expect(config.outputDirectory).toBe('');
        expect(config.autoSaveTranscripts).toBe(false);
        expect(config.transcriptFileSuffix).toBe('_transcript');
        expect(config.showProgress).toBe(true);
        expect(config.useDecorativeOutput).toBe(true);
    });

    it('should strip quotes and whitespace from environment variables', () => {
        process.env.OPENAI_API_KEY = '  "test-key-with-quotes"  ';
        process.env.DEFAULT_LANGUAGE = "'es'";

        const config = loadConfig();
        expect(config.apiKey).toBe('test-key-with-quotes');
        expect(config.defaultLanguage).toBe('es');
    });

    it('should normalise the extension allow-list to lower case', () => {
        process.env.SUPPORTED_FORMATS = ' .WAV, .Mp3 ,,';

        const config = loadConfig();
        expect(Array.from(config.supportedExtensions)).toEqual(['.wav', '.mp3']);
    });

    it('should convert the size limit from megabytes to bytes', () => {
        process.env.MAX_FILE_SIZE_MB = '"1"';

        expect(loadConfig().maxFileSizeBytes).toBe(1048576);
    });

    it('should parse boolean flags case-insensitively', () => {
        process.env.AUTO_SAVE_TRANSCRIPTS = 'TRUE';
        process.env.SHOW_PROGRESS = 'false';
        process.env.USE_EMOJIS = 'no';

        const config = loadConfig();
        expect(config.autoSaveTranscripts).toBe(true);
        expect(config.showProgress).toBe(false);
        expect(config.useDecorativeOutput).toBe(false);
    });

    it('should reject non-numeric sizes', () => {
        process.env.MAX_FILE_SIZE_MB = 'abc';

        expect(() => loadConfig()).toThrow('Environment variable MAX_FILE_SIZE_MB must be a number, got: abc');
    });

    it('should return a frozen object', () => {
        expect(Object.isFrozen(loadConfig())).toBe(true);
    });

    describe('validateConfig', () => {
        it('should accept the defaults', () => {
            expect(validateConfig(loadConfig())).toEqual([]);
        });

        it('should report unusable limits and extensions', () => {
            const config = {
                ...loadConfig(),
                maxFileSizeBytes: 0,
                supportedExtensions: new Set(['wav']),
            };

            expect(validateConfig(config)).toEqual([
                'MAX_FILE_SIZE_MB must be greater than zero',
                'SUPPORTED_FORMATS entry "wav" must start with "."',
            ]);
        });

        it('should report an empty allow-list', () => {
            const config = { ...loadConfig(), supportedExtensions: new Set<string>() };

            expect(validateConfig(config)).toEqual(['SUPPORTED_FORMATS must list at least one extension']);
        });
    });
});
