import chalk from 'chalk';
import { createInterface } from 'readline';
import { stdin, stdout } from 'process';
import { PromptAbortedError } from '../helpers/errors';

/**
 * Picks one of `choices`, falling back to `defaultIndex`.
 */
export interface Prompter {
  select(
    question: string,
    choices: readonly string[],
    defaultIndex?: number
  ): Promise<string>;
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Numbered-list selection over readline. Enter alone picks the default,
 * anything out of range asks again. Blocks until answered or input ends.
 */
export class ReadlinePrompter implements Prompter {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.input = options.input ?? stdin;
    this.output = options.output ?? stdout;
  }

  async select(
    question: string,
    choices: readonly string[],
    defaultIndex: number = 0
  ): Promise<string> {
    if (choices.length === 0) {
      throw new Error('Nothing to choose from');
    }

    const fallback =
      defaultIndex >= 0 && defaultIndex < choices.length ? defaultIndex : 0;

    this.output.write(`${chalk.bold(question)}\n`);
    choices.forEach((choice, index) => {
      const marker = index === fallback ? chalk.cyan('=>') : '  ';
      this.output.write(`${marker} ${index + 1}. ${choice}\n`);
    });

    const rl = createInterface({
      input: this.input,
      terminal: false,
      crlfDelay: Infinity,
    });

    try {
      this.ask(fallback);
      for await (const line of rl) {
        const answer = line.trim();

        if (!answer) {
          return choices[fallback];
        }

        const index = Number.parseInt(answer, 10) - 1;
        if (/^\d+$/.test(answer) && index >= 0 && index < choices.length) {
          return choices[index];
        }

        this.output.write(`${chalk.red('Invalid selection')}: ${answer}\n`);
        this.ask(fallback);
      }
    } finally {
      rl.close();
    }

    throw new PromptAbortedError();
  }

  private ask(fallback: number): void {
    this.output.write(`Enter number [${fallback + 1}]: `);
  }
}
