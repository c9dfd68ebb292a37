/**
 * Terminal I/O Utilities
 *
 * Wraps node:readline/promises for the interactive `auth` command and
 * provides the styled output helpers the CLI prints with.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export function createPrompt(): Interface {
  return createInterface({ input: stdin, output: stdout });
}

/**
 * Ask a question and return the trimmed answer, falling back to
 * defaultValue. Loops until a non-empty answer when required.
 */
export async function ask(
  rl: Interface,
  question: string,
  opts: { required?: boolean; defaultValue?: string } = {}
): Promise<string> {
  const suffix = opts.defaultValue ? ` [${opts.defaultValue}]` : '';

  for (;;) {
    const value = (await rl.question(`${question}${suffix}: `)).trim() || opts.defaultValue || '';
    if (opts.required && !value) {
      printWarning('This field is required.');
      continue;
    }
    return value;
  }
}

/**
 * Ask for a secret (API token, password). Input is masked on a terminal;
 * when stdin is piped the next line is read as-is, so
 * `echo "$TOKEN" | ticket-pulse auth github` works in provisioning scripts.
 */
export async function askSecret(rl: Interface, question: string): Promise<string> {
  if (!stdin.isTTY) {
    return (await rl.question(`${question}: `)).trim();
  }

  stdout.write(`${question}: `);
  rl.pause();

  return new Promise((resolve, reject) => {
    let secret = '';

    const finish = (): void => {
      stdin.setRawMode(false);
      stdin.removeListener('data', onData);
      stdout.write('\n');
      rl.resume();
    };

    const onData = (data: Buffer): void => {
      for (const char of data.toString()) {
        if (char === '\n' || char === '\r' || char === '\u0004') {
          finish();
          resolve(secret.trim());
          return;
        }
        if (char === '\u0003') {
          finish();
          reject(new Error('Cancelled'));
          return;
        }
        if (char === '\u007F' || char === '\b') {
          if (secret.length > 0) {
            secret = secret.slice(0, -1);
            stdout.write('\b \b');
          }
        } else if (char.charCodeAt(0) >= 32) {
          secret += char;
          stdout.write('*');
        }
      }
    };

    stdin.setRawMode(true);
    stdin.resume();
    stdin.on('data', onData);
  });
}

// ─── Styled Output ───────────────────────────────────────────

const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

export function printHeader(text: string): void {
  console.log(`\n${BOLD}${CYAN}${text}${RESET}`);
  console.log(`${DIM}${'─'.repeat(text.length)}${RESET}`);
}

export function printSuccess(text: string): void {
  console.log(`${GREEN}[ok]${RESET} ${text}`);
}

export function printWarning(text: string): void {
  console.log(`${YELLOW}[!]${RESET} ${text}`);
}

export function printInfo(text: string): void {
  console.log(`${DIM}[i]${RESET} ${text}`);
}
