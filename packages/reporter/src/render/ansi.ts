// Minimal ANSI helpers (no external deps)
export const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  green: '\u001B[32m',
  yellow: '\u001B[33m',
  dim: '\u001B[2m',
  bold: '\u001B[1m',
} as const;

export function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

export function stripAnsi(input: string): string {
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
