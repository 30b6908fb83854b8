export class EngineInputError extends Error {
  readonly index: number;

  constructor(message: string, index: number) {
    super(`${message} (record #${index})`);
    this.name = 'EngineInputError';
    this.index = index;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
