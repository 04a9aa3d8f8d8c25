const LOG_PREFIX = "[termspan]";

export function logWarning(message: string): void {
  console.warn(`${LOG_PREFIX} ${message}`);
}
