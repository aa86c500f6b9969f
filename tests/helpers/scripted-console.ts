/**
 * In-process operator for driving prompts from tests: replays scripted
 * answers and records everything shown.
 */
import { OperatorInputClosedError } from '../../src/errors.js';
import type { OperatorConsole } from '../../src/prompt.js';

export class ScriptedConsole implements OperatorConsole {
  /** Questions asked, in order */
  readonly questions: string[] = [];
  /** Everything printed or written, one entry per call */
  readonly output: string[] = [];
  closed = false;

  private answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  queue(...answers: string[]): void {
    this.answers.push(...answers);
  }

  get remaining(): number {
    return this.answers.length;
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new OperatorInputClosedError();
    }
    return answer;
  }

  print(text: string): void {
    this.output.push(`${text}\n`);
  }

  write(text: string): void {
    this.output.push(text);
  }

  close(): void {
    this.closed = true;
  }
}

/** Answer a value and confirm it with an empty line. */
export function confirmed(...values: Array<number | string>): string[] {
  return values.flatMap((value) => [String(value), '']);
}
