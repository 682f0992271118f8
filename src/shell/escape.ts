/**
 * Escape a string so it is passed to a POSIX shell as a single word
 */
export function shellEscape(value: string): string {
  if (value === '') {
    return "''";
  }
  return value.replace(/[^A-Za-z0-9_\-.,:+/@\n]/g, '\\$&').replace(/\n/g, "'\n'");
}

/**
 * Wrap a string in double quotes. Variable references are only kept live
 * when `expand` is set.
 */
export function doubleQuote(value: string, expand = false): string {
  return `"${escapeDoubleQuoted(value, expand)}"`;
}

export function escapeDoubleQuoted(value: string, expand = false): string {
  const special = expand ? /(["\\`])/g : /(["\\`$])/g;
  return value.replace(special, '\\$1');
}
