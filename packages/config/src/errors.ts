/**
 * Invalid configuration file or option value
 */
export class ConfigError extends Error {
  /** Config file the error was found in, if any */
  public readonly filePath: string | undefined;
  /** `path: message` entries, one per problem */
  public readonly issues: string[];

  constructor(message: string, options: { filePath?: string; issues?: string[] } = {}) {
    super(message);
    this.name = 'ConfigError';
    this.filePath = options.filePath;
    this.issues = options.issues ?? [];
  }
}
