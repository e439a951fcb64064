/**
 * Shared formatting utilities for CLI output.
 */

/**
 * Fluent builder for multi-line console output.
 */
export class OutputFormatter {
  private lines: string[] = [];

  text(content: string): this {
    this.lines.push(content);
    return this;
  }

  blank(): this {
    this.lines.push('');
    return this;
  }

  list(items: string[], indent: number = 2): this {
    const prefix = ' '.repeat(indent);
    items.forEach((item) => this.lines.push(prefix + item));
    return this;
  }

  section(title: string, items: string[], indent: number = 2): this {
    this.lines.push(title);
    return this.list(items, indent);
  }

  keyValueList(pairs: Array<[string, string]>, indent: number = 2): this {
    const width = Math.max(...pairs.map(([key]) => key.length)) + 2;
    const prefix = ' '.repeat(indent);
    pairs.forEach(([key, value]) => this.lines.push(prefix + `${key}:`.padEnd(width) + value));
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

/**
 * Join lines, skipping the falsy placeholders conditional lines leave behind.
 *
 * @example
 * ```typescript
 * joinLines('Error: Unknown command', hint && `Did you mean: ${hint}`);
 * ```
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

/**
 * Render a command result for humans: strings as-is, everything else as
 * indented JSON.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value, null, 2) ?? 'null';
}
