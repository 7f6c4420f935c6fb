/** A command typed on the runner CLI's stdin. */
export type ConsoleCommand =
  | { type: 'find'; operationId: string }
  | { type: 'run'; operationId: string }
  | { type: 'cancel'; operationId: string }
  | { type: 'quit' }
  | { type: 'empty' }
  | { type: 'invalid'; reason: string }

/**
 * Pure parse of one stdin line: `find <id>`, `run <id>`, `cancel <id>`, or `quit`.
 * Keywords are case-insensitive; the operation ID is kept as typed.
 */
export function parseConsoleCommand(line: string): ConsoleCommand {
  const parts = line.trim().split(/\s+/).filter((part) => part !== '')
  if (parts.length === 0) {
    return { type: 'empty' }
  }

  const [keyword, ...args] = parts
  const command = keyword.toLowerCase()

  if (command === 'find' || command === 'run' || command === 'cancel') {
    if (args.length !== 1) {
      return { type: 'invalid', reason: `${command} takes exactly one operation ID` }
    }
    return { type: command, operationId: args[0] }
  }

  if (command === 'quit') {
    if (args.length !== 0) {
      return { type: 'invalid', reason: 'quit takes no arguments' }
    }
    return { type: 'quit' }
  }

  return { type: 'invalid', reason: `unknown command "${keyword}"` }
}
