import * as path from 'node:path';

/**
 * Replace the extension of the last path segment (`report.md` → `report.pdf`),
 * or append one when it has none.
 */
export function changeExtension(filePath: string, extension: string): string {
  const { dir, name, ext } = path.parse(filePath);
  if (!ext) {
    return filePath + extension;
  }
  return path.join(dir, name + extension);
}

/**
 * Strip the quotes a shell may leave around an argument.
 */
export function trimQuotes(text: string): string {
  let begin = 0;
  let end = text.length;
  while (begin < end && text.charAt(begin) === '"') begin++;
  while (end > begin && text.charAt(end - 1) === '"') end--;
  return text.substring(begin, end);
}
