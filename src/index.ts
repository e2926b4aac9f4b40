#!/usr/bin/env node
import { loadConfig, validateConfig } from './config';
import { resolveApiKey } from './config/credentials';
import { createTranscriber } from './application/TranscriberFactory';
import { ConfigurationError, describeError } from './domain/errors/TranscriberErrors';
import { ConsoleReporter } from './infrastructure/logging/ConsoleReporter';
import { CliOptions, USAGE, parseCliArgs } from './presentation/cli/args';
import { runBatchCommand } from './presentation/cli/BatchCommand';
import { InteractiveMenu } from './presentation/cli/InteractiveMenu';
import { ReadlinePrompter } from './presentation/cli/Prompter';

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        console.error(describeError(error));
        console.error(USAGE);
        return 1;
    }
    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    const config = loadConfig();
    const reporter = new ConsoleReporter({
        showProgress: config.showProgress,
        useDecorativeOutput: config.useDecorativeOutput,
    });

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        reporter.error('Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        return 1;
    }

    reporter.info('Audio Transcription using OpenAI Whisper', 'title');
    reporter.info('='.repeat(50));

    const interactive = options.files.length === 0;
    const prompter = interactive ? new ReadlinePrompter() : undefined;

    try {
        const apiKey = await resolveApiKey({
            explicit: options.apiKey,
            config,
            prompt: prompter
                ? () => {
                    reporter.info('OpenAI API key not found in configuration or environment variables.', 'key');
                    reporter.info('Please enter your OpenAI API key:');
                    return prompter.ask('API Key: ');
                }
                : undefined,
        });

        const transcriber = createTranscriber(config, { apiKey, reporter });

        if (prompter) {
            await new InteractiveMenu(transcriber, prompter, config, options.language).run();
        } else {
            await runBatchCommand(transcriber, {
                files: options.files,
                language: options.language,
                output: options.output,
            });
        }
        return 0;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            reporter.error(`Error: ${error.message}`);
            return 1;
        }
        throw error;
    } finally {
        prompter?.close();
    }
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error) => {
            console.error('💥 Fatal error:', error);
            process.exit(1);
        });
}
