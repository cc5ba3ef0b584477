// Raw terminal control sequences. Colors go through chalk.
export const ansi = {
  hideCursor: '\u001b[?25l',
  showCursor: '\u001b[?25h',
  cursorHome: '\u001b[H',
  reset: '\u001b[0m',
} as const
