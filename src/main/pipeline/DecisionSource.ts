/**
 * DecisionSource.ts - Where the frame-rate gate gets its yes/no answer
 */

import readline from 'readline';

export interface DecisionSource {
  confirm(question: string): Promise<boolean>;
}

/**
 * Non-interactive source used with --yes.
 */
export function autoAccept(): DecisionSource {
  return {
    confirm: async () => true,
  };
}

/**
 * Answers that count as acceptance; everything else declines.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Ctrl-C at the prompt. In raw mode readline swallows the keystroke, so no
 * process SIGINT is delivered; the caller must treat this as an interrupt.
 */
export class DecisionInterruptedError extends Error {
  constructor() {
    super('Interrupted at the frame-rate prompt');
    this.name = 'DecisionInterruptedError';
  }
}

/**
 * Ask once on a terminal. Closed input (EOF, piped stdin) declines; Ctrl-C
 * rejects with DecisionInterruptedError.
 */
export function promptDecision(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): DecisionSource {
  return {
    confirm: (question) =>
      new Promise<boolean>((resolve, reject) => {
        const rl = readline.createInterface({ input, output });
        let settled = false;

        rl.on('SIGINT', () => {
          settled = true;
          rl.close();
          reject(new DecisionInterruptedError());
        });

        rl.on('close', () => {
          if (!settled) {
            settled = true;
            resolve(false);
          }
        });

        rl.question(`${question} [y/N] `, (answer) => {
          settled = true;
          rl.close();
          resolve(isAffirmative(answer));
        });
      }),
  };
}
