import stripAnsi from 'strip-ansi';
import stringWidth from 'string-width';

export function visibleWidth(text: string): number {
  return stringWidth(stripAnsi(text));
}

export function padAnsi(text: string, width: number): string {
  const current = visibleWidth(text);
  if (current >= width) return text;
  return text + ' '.repeat(width - current);
}
