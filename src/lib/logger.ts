/**
 * Console narration with ANSI colors
 */

export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

export const log = {
  info: (msg: string) => console.log(cyan(msg)),
  success: (msg: string) => console.log(green(msg)),
  warn: (msg: string) => console.log(yellow(msg)),
  error: (msg: string) => console.error(red(msg)),
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
