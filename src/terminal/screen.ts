/**
 * Scoped terminal mode: raw input, alternate screen, hidden cursor.
 *
 * Entered once around the interactive session and restored on every way
 * out of it, including thrown errors and SIGTERM.
 */

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const TERMINAL_CODES = {
  altOn: `${CSI}?1049h`,
  altOff: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  reset: `${CSI}0m`,
} as const;

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  write(chunk: string): boolean;
}

export interface TerminalStreams {
  input: TerminalInput;
  output: TerminalOutput;
}

/** Exit status for SIGTERM (128 + 15). */
const SIGTERM_EXIT_CODE = 143;

/**
 * Put the terminal into picker mode, run `fn`, and restore the terminal
 * however `fn` ends.
 */
export async function withTerminalScreen<T>(streams: TerminalStreams, fn: () => Promise<T>): Promise<T> {
  const { input, output } = streams;
  let restored = false;

  const restore = () => {
    if (restored) return;
    restored = true;
    output.write(TERMINAL_CODES.reset + TERMINAL_CODES.showCursor + TERMINAL_CODES.altOff);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(false);
    }
    input.pause();
  };

  const onSigterm = () => {
    restore();
    process.exit(SIGTERM_EXIT_CODE);
  };

  output.write(TERMINAL_CODES.altOn + TERMINAL_CODES.hideCursor);
  if (input.isTTY && input.setRawMode) {
    input.setRawMode(true);
  }
  input.resume();
  process.once('SIGTERM', onSigterm);

  try {
    return await fn();
  } finally {
    process.off('SIGTERM', onSigterm);
    restore();
  }
}
