import inquirer from 'inquirer';
import chalk from 'chalk';
import { Choice, TerminalUI, Tone } from '../types';

const TONES: Record<Tone, (text: string) => string> = {
  plain: (text) => text,
  info: chalk.blue,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

const required = (value: string) => (value.trim() ? true : 'A value is required');

/**
 * TerminalUI backed by inquirer prompts and chalk output
 */
export class InquirerUI implements TerminalUI {
  display(message: string, tone: Tone = 'plain'): void {
    const text = TONES[tone](message);
    if (tone === 'error') {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  /**
   * Ask a yes/no question
   * @param question prompt text
   * @param defaultValue answer used on enter
   */
  async confirm(question: string, defaultValue: boolean = false): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: question,
        default: defaultValue,
      },
    ]);

    return confirmed;
  }

  /**
   * Ask for a line of text. Without a default the answer may not be blank.
   * @param question prompt text
   * @param defaultValue answer used on enter
   */
  async ask(question: string, defaultValue?: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message: question,
        default: defaultValue,
        validate: defaultValue === undefined ? required : undefined,
      },
    ]);

    return value.trim();
  }

  async secret(question: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'password',
        name: 'value',
        message: question,
        mask: '*',
        validate: required,
      },
    ]);

    return value.trim();
  }

  /**
   * Pick one entry from a list
   * @param question prompt text
   * @param choices labelled values
   * @returns the chosen value
   */
  async select<T extends string>(question: string, choices: Choice<T>[]): Promise<T> {
    const { picked } = await inquirer.prompt<{ picked: T }>([
      {
        type: 'list',
        name: 'picked',
        message: question,
        choices,
      },
    ]);

    return picked;
  }
}
