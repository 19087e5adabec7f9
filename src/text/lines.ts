/** Convert CRLF and lone CR line endings to LF. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/** Reduce every run of three or more newlines to one blank line. */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}

/** Strip trailing whitespace from each line. */
export function rightTrimLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');
}

/** Split on LF, right-trimming each line and keeping blank lines. */
export function splitLines(text: string): string[] {
  return text.split('\n').map((line) => line.trimEnd());
}
