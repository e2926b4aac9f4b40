import * as readline from 'readline';

/**
 * Line-oriented question/answer source for the interactive menu.
 */
export interface Prompter {
    ask(question: string): Promise<string>;
    /** True once input has ended; further answers are empty */
    isClosed(): boolean;
    close(): void;
}

/**
 * Prompter over stdin/stdout. Answers are returned trimmed.
 */
export class ReadlinePrompter implements Prompter {
    private readonly rl: readline.Interface;
    private closed = false;
    private pending: Array<(answer: string) => void> = [];

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output });
        this.rl.on('close', () => {
            this.closed = true;
            // Input ended while a question was waiting
            this.pending.forEach((resolve) => resolve(''));
            this.pending = [];
        });
    }

    ask(question: string): Promise<string> {
        if (this.closed) {
            return Promise.resolve('');
        }
        return new Promise((resolve) => {
            this.pending.push(resolve);
            this.rl.question(question, (answer) => {
                this.pending = this.pending.filter((waiting) => waiting !== resolve);
                resolve(answer.trim());
            });
        });
    }

    isClosed(): boolean {
        return this.closed;
    }

    close(): void {
        this.rl.close();
    }
}

/**
 * Strips whitespace and the double quotes terminals add around dragged-in paths.
 */
export function cleanPathAnswer(answer: string): string {
    return answer.trim().replace(/^"+|"+$/g, '');
}
