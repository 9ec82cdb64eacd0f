import * as readline from 'readline';
import { Writable } from 'stream';

/**
 * Ask a question on the terminal. Resolves null when the prompt is closed
 * or interrupted before an answer.
 */
export function prompt(question: string, options: { hidden?: boolean } = {}): Promise<string | null> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        process.stdout.write(chunk, encoding);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: process.stdin.isTTY === true,
  });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) resolve(null);
    });

    rl.on('SIGINT', () => {
      rl.close();
      process.kill(process.pid, 'SIGINT');
    });

    process.stdout.write(question);
    muted = options.hidden === true;

    rl.question('', (answer) => {
      answered = true;
      if (muted) process.stdout.write('\n');
      rl.close();
      resolve(muted ? answer : answer.trim());
    });
  });
}

export interface Credentials {
  username: string;
  password: string;
}

export async function promptCredentials(): Promise<Credentials | null> {
  const username = await prompt('Username: ');
  if (username === null) return null;

  const password = await prompt('Password: ', { hidden: true });
  if (password === null) return null;

  return { username, password };
}
