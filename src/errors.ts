export class LogseqApiError extends Error {
  constructor(message: string, public readonly statusCode: number = 502) {
    super(message);
    this.name = 'LogseqApiError';
  }
}

export class PageNotFoundError extends Error {
  constructor(public readonly pageName: string) {
    super(`Page '${pageName}' does not exist`);
    this.name = 'PageNotFoundError';
  }
}

export class ToolInputError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'ToolInputError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
