import { Config } from './index';
import { ConfigurationError } from '../domain/errors/TranscriberErrors';

const PLACEHOLDER_KEYS = new Set(['YOUR_API_KEY', 'your-openai-api-key-here']);

export interface ApiKeySources {
    /** Key passed on the command line or by the embedding program */
    explicit?: string;
    /** Loaded configuration (environment and .env) */
    config: Pick<Config, 'apiKey'>;
    /** Last resort, only supplied by interactive front-ends */
    prompt?: () => Promise<string>;
}

function usable(key: string | undefined): key is string {
    return key !== undefined && key.trim().length > 0 && !PLACEHOLDER_KEYS.has(key.trim());
}

/**
 * Resolves the API key: explicit argument, then configuration, then prompt.
 * Throws ConfigurationError when every source comes up empty.
 */
export async function resolveApiKey(sources: ApiKeySources): Promise<string> {
    if (usable(sources.explicit)) {
        return sources.explicit.trim();
    }
    if (usable(sources.config.apiKey)) {
        return sources.config.apiKey.trim();
    }
    if (sources.prompt) {
        const entered = await sources.prompt();
        if (usable(entered)) {
            return entered.trim();
        }
        throw new ConfigurationError('API key is required!');
    }
    throw new ConfigurationError(
        'OpenAI API key not found. Pass --api-key or set OPENAI_API_KEY in the environment or .env file.'
    );
}
