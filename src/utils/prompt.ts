// src/utils/prompt.ts
import readline from 'readline';
import { Writable } from 'stream';

export interface PromptStreams {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

/**
 * Asks for a secret on the terminal without echoing what is typed.
 * Resolves with the first line read, or '' if input ends first.
 */
export async function askPassword(question: string, streams: PromptStreams = {}): Promise<string> {
    const input = streams.input ?? process.stdin;
    const output = streams.output ?? process.stdout;

    // Keystrokes go to a sink; only the question reaches the real output
    const muted = new Writable({
        write(_chunk, _encoding, callback) {
            callback();
        },
    });
    const rl = readline.createInterface({
        input,
        output: muted,
        terminal: input === process.stdin && process.stdin.isTTY === true,
    });

    output.write(question);
    try {
        return await new Promise<string>(resolve => {
            rl.once('line', resolve);
            rl.once('close', () => resolve(''));
        });
    } finally {
        rl.close();
        output.write('\n');
    }
}
