/**
 * Where command actions write. Commands use the console; tests pass a
 * collecting sink instead.
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Sink that records lines, for in-process assertions.
 */
export function createBufferedOutput(): Output & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    log: (line) => stdout.push(line),
    error: (line) => stderr.push(line),
  };
}
