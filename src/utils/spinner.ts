/**
 * Progress spinner for long extractions
 *
 * Drawn on stderr with ora, so stdout stays clean for the event table
 * and stdin can still carry piped schedule text.
 */

import ora from 'ora';
import { getOutputOptions } from './output.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/** 128 + SIGINT */
export const EXIT_INTERRUPTED = 130;

export interface SpinnerHost {
  json: boolean;
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  stream: NodeJS.WritableStream;
  /** The stream is a terminal */
  tty: boolean;
}

export function detectHost(): SpinnerHost {
  return {
    json: getOutputOptions().json === true,
    platform: process.platform,
    env: process.env,
    stream: process.stderr,
    tty: process.stderr.isTTY === true,
  };
}

/**
 * Off in JSON mode, off the terminal, and on Windows or PowerShell hosts,
 * where progress redraws come out as CLIXML noise
 */
export function isSpinnerEnabled(host: SpinnerHost): boolean {
  if (host.json || !host.tty) return false;
  if (host.platform === 'win32') return false;
  return !host.env.PSModulePath && !host.env.POWERSHELL_DISTRIBUTION_CHANNEL;
}

export interface SpinnerOptions<T> {
  /** Success line built from the result; the start text is kept when absent */
  done?: (result: T) => string;
  host?: SpinnerHost;
}

/**
 * Run `fn` behind a spinner. Ctrl-C while it spins stops the spinner and
 * exits with EXIT_INTERRUPTED.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  options: SpinnerOptions<T> = {}
): Promise<T> {
  const host = options.host ?? detectHost();
  if (!isSpinnerEnabled(host)) {
    return fn();
  }

  const spinner = ora({
    text,
    stream: host.stream,
    spinner: { frames: SPINNER_FRAMES, interval: 80 },
  }).start();

  const onInterrupt = () => {
    spinner.stop();
    process.exit(EXIT_INTERRUPTED);
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await fn();
    spinner.succeed(options.done?.(result));
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
