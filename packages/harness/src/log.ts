/** Line logger injected into checks */
export type Logger = (message: string) => void;

/**
 * Timestamped logger: `[2024-01-01T00:00:00.000Z] message`
 */
export function createLogger(write: (line: string) => void = (line) => console.log(line)): Logger {
  return (message) => {
    const time = new Date().toISOString();
    write(`[${time}] ${message}`);
  };
}
