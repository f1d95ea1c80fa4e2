export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {}

export class PromptNotFoundError extends AppError {
  constructor(
    readonly templateId: string,
    readonly templatePath: string
  ) {
    super(`Prompt template "${templateId}" not found at ${templatePath}.`);
  }
}

export class IterationLimitError extends AppError {
  constructor(readonly maxIterations: number) {
    super(`Reasoning loop stopped after ${maxIterations} tool iterations without an answer.`);
  }
}

export class MalformedModelResponseError extends AppError {}
