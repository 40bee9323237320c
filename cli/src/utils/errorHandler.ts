/**
 * Print a command failure and exit with status 1.
 */
export function handleCommandError(error: unknown, action: string): never {
  if (error instanceof Error) {
    console.error(`Error ${action}: ${error.message}`);
  } else {
    console.error(`Error ${action}:`, error);
  }
  process.exit(1);
}

export function wrapCommand<T extends unknown[]>(
  action: string,
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleCommandError(error, action);
    }
  };
}
