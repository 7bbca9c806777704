export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly variables: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
