import readline from 'readline';

/** Source of user answers. Resolves null once input has ended. */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface OutputSink {
  print(line?: string): void;
}

export const consoleOutput: OutputSink = {
  print: (line = '') => {
    process.stdout.write(`${line}\n`);
  },
};

/**
 * Prompter over a terminal (stdin/stdout by default). Lines are queued as they
 * arrive, so piped or pasted input answers later questions in order.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly pending: string[] = [];
  private waiting: ((answer: string | null) => void) | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('line', line => {
      if (this.waiting) {
        this.settle(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      this.settle(null);
    });
  }

  private settle(answer: string | null): void {
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.(answer);
  }

  ask(question: string): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued === undefined && this.closed) return Promise.resolve(null);

    if (!this.closed) {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
