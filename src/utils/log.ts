// Diagnostics go to stderr. stdout is reserved for command output.

export function debug(msg: string) {
  if (process.env.TODO_DEBUG) {
    process.stderr.write(`[todo] DEBUG: ${msg}\n`);
  }
}
