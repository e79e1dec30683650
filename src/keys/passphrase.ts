import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';
import { KeyManagerError } from './errors.js';

export type PassphrasePrompt = (prompt: string) => Promise<string>;

export interface PassphraseOptions {
  env?: Record<string, string | undefined>;
  ask?: PassphrasePrompt;
}

export const CONFIRM_PROMPT = 'Confirm passphrase: ';

/**
 * Forwards writes to the terminal until muted. Keystroke echo goes through
 * the same stream, so muting it hides what is typed.
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

/**
 * Prompt for a line without echoing it.
 */
export async function promptHidden(
  prompt: string,
  streams: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream }
): Promise<string> {
  const output = new MutableOutput(streams.output);
  const rl = createInterface({ input: streams.input, output, terminal: true, historySize: 0 });
  try {
    const answer = rl.question(prompt);
    output.muted = true;
    return await answer;
  } finally {
    rl.close();
    streams.output.write('\n');
  }
}

function terminalPrompt(envName: string): PassphrasePrompt {
  return (prompt) => {
    if (!process.stdin.isTTY) {
      throw new KeyManagerError('invalid_passphrase', `${envName} is not set and no terminal is attached.`);
    }
    return promptHidden(prompt, { input: process.stdin, output: process.stderr });
  };
}

/**
 * Read a passphrase from the environment, or prompt on an interactive terminal.
 * Non-interactive processes without the variable set fail instead of hanging.
 */
export async function readPassphrase(
  envName: string,
  prompt: string,
  options: PassphraseOptions = {}
): Promise<string> {
  const fromEnv = (options.env ?? process.env)[envName];
  if (fromEnv) {
    return fromEnv;
  }
  const ask = options.ask ?? terminalPrompt(envName);
  return ask(prompt);
}

/**
 * Like readPassphrase, but a prompted passphrase must be typed twice.
 */
export async function readNewPassphrase(
  envName: string,
  prompt: string,
  options: PassphraseOptions = {}
): Promise<string> {
  const fromEnv = (options.env ?? process.env)[envName];
  if (fromEnv) {
    return fromEnv;
  }
  const ask = options.ask ?? terminalPrompt(envName);
  const passphrase = await ask(prompt);
  const confirmation = await ask(CONFIRM_PROMPT);
  if (passphrase !== confirmation) {
    throw new KeyManagerError('invalid_passphrase', 'Passphrases do not match.');
  }
  return passphrase;
}
