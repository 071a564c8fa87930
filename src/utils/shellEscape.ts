/**
 * Shell-escape a string for safe interpolation into a shell command.
 * Wraps in single quotes and escapes embedded single quotes.
 *
 * @example shellEscape("foo'bar") => "'foo'\\''bar'"
 * @example shellEscape("normal") => "'normal'"
 */
export function shellEscape(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'"
}

/** Build a command line from a program and its arguments, escaping each argument */
export function shellCommand(program: string, args: string[]): string {
  return [program, ...args.map(shellEscape)].join(' ')
}
