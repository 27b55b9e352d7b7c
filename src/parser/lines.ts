/**
 * Split raw document text into lines the way an editor buffer holds them:
 * `\r\n` and `\n` both end a line, and a final line break does not start an
 * extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
