import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_SUPPORTED_FORMATS = ['.mp3', '.mp4', '.mpeg', '.mpga', '.m4a', '.wav', '.webm'];

/**
 * Application configuration loaded from environment variables.
 * Built once at start-up and passed to each component; never mutated.
 */
export interface Config {
    // Transcription backend
    readonly apiKey: string;
    readonly apiBaseUrl: string;
    readonly transcriptionModel: string;
    readonly requestTimeoutMs: number;
    readonly defaultLanguage: string;

    // File validation
    readonly maxFileSizeBytes: number;
    readonly supportedExtensions: ReadonlySet<string>;

    // Output
    readonly outputDirectory: string; // Empty means "next to the source file"
    readonly autoSaveTranscripts: boolean;
    readonly transcriptFileSuffix: string;

    // Display
    readonly showProgress: boolean;
    readonly useDecorativeOutput: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getEnvVarList(key: string, defaultValue: string[]): string[] {
    const value = getEnvVar(key, defaultValue.join(','));
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Lower-cases extensions so that allow-list lookups are case-insensitive.
 */
export function normalizeExtensions(extensions: Iterable<string>): ReadonlySet<string> {
    return new Set(Array.from(extensions, (ext) => ext.toLowerCase()));
}

/**
 * Loads configuration from environment variables.
 * Missing API key is not an error here; see resolveApiKey.
 */
export function loadConfig(): Config {
    return Object.freeze({
        apiKey: getEnvVar('OPENAI_API_KEY', ''),
        apiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),
        transcriptionModel: getEnvVar('TRANSCRIPTION_MODEL', 'whisper-1'),
        requestTimeoutMs: getEnvVarNumber('TRANSCRIPTION_TIMEOUT_MS', 300000),
        defaultLanguage: getEnvVar('DEFAULT_LANGUAGE', 'en'),

        maxFileSizeBytes: Math.round(getEnvVarNumber('MAX_FILE_SIZE_MB', 25) * BYTES_PER_MB),
        supportedExtensions: normalizeExtensions(getEnvVarList('SUPPORTED_FORMATS', DEFAULT_SUPPORTED_FORMATS)),

        outputDirectory: getEnvVar('OUTPUT_DIRECTORY', ''),
        autoSaveTranscripts: getEnvVarBoolean('AUTO_SAVE_TRANSCRIPTS', false),
        transcriptFileSuffix: getEnvVar('TRANSCRIPT_FILE_SUFFIX', '_transcript'),

        showProgress: getEnvVarBoolean('SHOW_PROGRESS', true),
        useDecorativeOutput: getEnvVarBoolean('USE_EMOJIS', true),
    });
}

/**
 * Checks settings that would make every transcription fail.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!(config.maxFileSizeBytes > 0)) {
        errors.push('MAX_FILE_SIZE_MB must be greater than zero');
    }
    if (config.supportedExtensions.size === 0) {
        errors.push('SUPPORTED_FORMATS must list at least one extension');
    }
    for (const ext of config.supportedExtensions) {
        if (!ext.startsWith('.')) {
            errors.push(`SUPPORTED_FORMATS entry "${ext}" must start with "."`);
        }
    }
    if (!config.transcriptionModel) {
        errors.push('TRANSCRIPTION_MODEL must not be empty');
    }
    if (!(config.requestTimeoutMs > 0)) {
        errors.push('TRANSCRIPTION_TIMEOUT_MS must be greater than zero');
    }

    return errors;
}
