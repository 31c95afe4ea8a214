export interface OutputOptions {
  color: boolean;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Results go to stdout as JSON so they can be piped; everything meant for a
 * person goes to stderr.
 */
export class Output {
  constructor(private options: OutputOptions) {}

  log(message: string): void {
    this.options.stderr(message + '\n');
  }

  json(data: unknown): void {
    this.options.stdout(JSON.stringify(data, null, 2) + '\n');
  }

  error(message: string): void {
    this.options.stderr(this.formatError(message) + '\n');
  }

  private formatError(message: string): string {
    if (this.options.color) {
      return `\x1b[31mError:\x1b[0m ${message}`;
    }
    return `Error: ${message}`;
  }
}

export function createOutput(options: Partial<OutputOptions> = {}): Output {
  const defaults: OutputOptions = {
    color: process.stderr.isTTY === true,
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
  };

  return new Output({ ...defaults, ...options });
}
