export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export class Logger {
  public constructor(
    private readonly verbose: boolean,
    private readonly scope: string | null = null,
  ) {}

  /**
   * Returns a logger sharing this one's verbosity that tags every line with `scope`.
   */
  public child(scope: string): Logger {
    return new Logger(this.verbose, this.scope ? `${this.scope}/${scope}` : scope);
  }

  public get isVerbose(): boolean {
    return this.verbose;
  }

  public info(message: string): void {
    this.print("INFO", message);
  }

  public warn(message: string): void {
    this.print("WARN", message);
  }

  public error(message: string): void {
    this.print("ERROR", message);
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.print("DEBUG", message);
  }

  private print(level: LogLevel, message: string): void {
    const ts = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    const output = `[${ts}] [${level}]${scope} ${this.redact(message)}`;

    if (level === "ERROR") {
      console.error(output);
      return;
    }

    console.log(output);
  }

  /**
   * Redacts the status API credential wherever it can end up in a log line:
   * - Authorization headers (`Bearer ...`)
   * - WebSocket URL query tokens (`?token=...`)
   * - JSON config payload fields (`"statusAuthToken":"..."`)
   */
  private redact(message: string): string {
    return String(message)
      .replace(/(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi, "$1***REDACTED***")
      .replace(/([?&]token=)[^&\s]+/gi, "$1***REDACTED***")
      .replace(/("statusAuthToken"\s*:\s*")[^"]+(")/gi, '$1***REDACTED***$2');
  }
}
