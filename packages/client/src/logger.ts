/**
 * Line sink for client log output. The CLI writes to the console; an embedding
 * application can hand in its own channel.
 */
export interface LoggerOutputChannel {
  appendLine(value: string): void;
}

export const consoleChannel: LoggerOutputChannel = {
  appendLine: (value) => {
    console.log(value);
  },
};

export class Logger {
  constructor(
    private readonly output: LoggerOutputChannel,
    private readonly verbose = false,
  ) {}

  public info(message: string): void {
    this.output.appendLine(this.format("INFO", message));
  }

  public warn(message: string): void {
    this.output.appendLine(this.format("WARN", message));
  }

  public error(message: string): void {
    this.output.appendLine(this.format("ERROR", message));
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.output.appendLine(this.format("DEBUG", message));
  }

  private format(level: "INFO" | "WARN" | "ERROR" | "DEBUG", message: string): string {
    return `[${new Date().toISOString()}] [${level}] ${message}`;
  }
}
