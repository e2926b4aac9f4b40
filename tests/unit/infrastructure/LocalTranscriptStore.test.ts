import * as fs from 'fs';
import * as path from 'path';
import { LocalTranscriptStore } from '../../../src/infrastructure/storage/LocalTranscriptStore';
import { createMockReporter, makeTempDir, removeTempDir } from '../../helpers/testDoubles';

describe('LocalTranscriptStore', () => {
    let dir: string;
    let reporter: ReturnType<typeof createMockReporter>;
    let store: LocalTranscriptStore;

    beforeEach(() => {
        dir = makeTempDir();
        reporter = createMockReporter();
        store = new LocalTranscriptStore(reporter);
    });

    afterEach(() => {
        removeTempDir(dir);
    });

    it('should write the transcript as UTF-8', async () => {
        const destination = path.join(dir, 'out.txt');

        expect(await store.save('café — 日本語', destination)).toBe(true);
        expect(fs.readFileSync(destination, 'utf-8')).toBe('café — 日本語');
        expect(reporter.progress).toHaveBeenCalledWith('saved', `Transcript saved to: ${destination}`);
    });

    it('should produce identical content when saved twice', async () => {
        const destination = path.join(dir, 'out.txt');

        await store.save('same text', destination);
        await store.save('same text', destination);

        expect(fs.readFileSync(destination, 'utf-8')).toBe('same text');
    });

    it('should replace longer existing content', async () => {
        const destination = path.join(dir, 'out.txt');
        fs.writeFileSync(destination, 'a much longer previous transcript');

        await store.save('short', destination);

        expect(fs.readFileSync(destination, 'utf-8')).toBe('short');
    });

    it('should return false and report when the directory does not exist', async () => {
        const destination = path.join(dir, 'missing', 'out.txt');

        expect(await store.save('text', destination)).toBe(false);
        expect(reporter.error).toHaveBeenCalledTimes(1);
        expect(reporter.error).toHaveBeenCalledWith(expect.stringMatching(/^Error saving transcript: ENOENT/));
        expect(reporter.progress).not.toHaveBeenCalled();
    });
});
