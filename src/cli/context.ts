export interface CommandContext {
  /** Working directory for inputs, outputs and globbing */
  cwd?: string;
  /** Receives a document printed to standard output */
  stdout?: (text: string) => void;
}

export function writeStdout(text: string): void {
  process.stdout.write(`${text}\n`);
}
