import { parseArgs } from 'util';

export interface CliOptions {
    apiKey?: string;
    language?: string;
    /** Destination for the combined transcript in batch mode */
    output?: string;
    help: boolean;
    files: string[];
}

export const USAGE = [
    'Usage: audio-transcriber [options] [files...]',
    '',
    'Without files an interactive menu is started.',
    '',
    'Options:',
    '  --api-key <key>     OpenAI API key (overrides OPENAI_API_KEY)',
    '  --language <code>   Language hint, e.g. en, es, fr',
    '  --output <file>     Save the combined transcript of all files',
    '  -h, --help          Show this help',
].join('\n');

export function parseCliArgs(argv: string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'api-key': { type: 'string' },
            language: { type: 'string', short: 'l' },
            output: { type: 'string', short: 'o' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    return {
        apiKey: values['api-key'],
        language: values.language,
        output: values.output,
        help: values.help ?? false,
        files: positionals,
    };
}
