import stripAnsi from 'strip-ansi';

/**
 * Clean terminal control sequences from process console output
 */
export function cleanConsoleOutput(text: string): string {
  let cleaned = stripAnsi(text);

  // Remove carriage returns that aren't part of a line ending
  cleaned = cleaned.replace(/\r(?!\n)/g, '');

  // Remove null bytes
  cleaned = cleaned.replace(/\0/g, '');

  return cleaned.trim();
}

/**
 * Keeps the last few non-empty console lines of a process
 */
export class OutputTail {
  private lines: string[] = [];
  private partial = '';

  constructor(private readonly maxLines = 5) {}

  append(text: string): string[] {
    const parts = (this.partial + text).split('\n');
    this.partial = parts.pop() ?? '';

    const added: string[] = [];
    for (const part of parts) {
      const line = cleanConsoleOutput(part);
      if (line) {
        added.push(line);
      }
    }

    this.lines = [...this.lines, ...added].slice(-this.maxLines);
    return added;
  }

  lastLine(): string | null {
    const pending = cleanConsoleOutput(this.partial);
    if (pending) return pending;
    return this.lines[this.lines.length - 1] ?? null;
  }

  getLines(): string[] {
    return [...this.lines];
  }
}
