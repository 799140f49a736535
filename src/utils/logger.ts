export type DebugLogger = (message: string) => void;

export const noopLogger: DebugLogger = () => {};

/**
 * Debug logger writing to stderr, enabled by the `debug` config flag
 */
export function createDebugLogger(debug: boolean): DebugLogger {
  if (!debug) return noopLogger;
  return (message: string) => {
    console.error(`[DEBUG] ${message}`);
  };
}
