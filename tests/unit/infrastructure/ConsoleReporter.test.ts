import { ConsoleReporter } from '../../../src/infrastructure/logging/ConsoleReporter';

describe('ConsoleReporter', () => {
    let log: jest.SpyInstance;
    let warn: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => { });
        warn = jest.spyOn(console, 'warn').mockImplementation(() => { });
        error = jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    it('should prefix messages with emojis when decorative output is on', () => {
        const reporter = new ConsoleReporter({ showProgress: true, useDecorativeOutput: true });

        reporter.progress('transcribing', 'Transcribing: a.wav');
        reporter.error('Error: boom');
        reporter.warn('Skipping a.wav due to error');

        expect(log).toHaveBeenCalledWith('🎵 Transcribing: a.wav');
        expect(error).toHaveBeenCalledWith('❌ Error: boom');
        expect(warn).toHaveBeenCalledWith('⚠️ Skipping a.wav due to error');
    });

    it('should print plain messages when decorative output is off', () => {
        const reporter = new ConsoleReporter({ showProgress: true, useDecorativeOutput: false });

        reporter.progress('stored', "Transcript stored as: 'a_transcript_0'");
        reporter.info('Goodbye!', 'goodbye');

        expect(log).toHaveBeenNthCalledWith(1, "Transcript stored as: 'a_transcript_0'");
        expect(log).toHaveBeenNthCalledWith(2, 'Goodbye!');
    });

    it('should suppress progress notes but not errors when progress is off', () => {
        const reporter = new ConsoleReporter({ showProgress: false, useDecorativeOutput: true });

        reporter.progress('saved', 'Transcript saved to: out.txt');
        reporter.error('Error saving transcript: EACCES');

        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith('❌ Error saving transcript: EACCES');
    });

    it('should leave info without an icon undecorated', () => {
        const reporter = new ConsoleReporter({ showProgress: true, useDecorativeOutput: true });

        reporter.info('1. Transcribe a single audio file');
        reporter.success('Successfully transcribed 2 files');

        expect(log).toHaveBeenNthCalledWith(1, '1. Transcribe a single audio file');
        expect(log).toHaveBeenNthCalledWith(2, '✅ Successfully transcribed 2 files');
    });
});
