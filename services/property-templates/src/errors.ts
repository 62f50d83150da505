export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

export class UnknownPropertyTypeError extends TemplateError {
  readonly templateId: string;

  constructor(templateId: string, available: readonly string[]) {
    super(`Unknown property type '${templateId}'. Available types: ${available.join(", ")}`);
    this.name = "UnknownPropertyTypeError";
    this.templateId = templateId;
  }
}

export class TemplateValidationError extends TemplateError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Template validation failed: ${errors.join("; ")}`);
    this.name = "TemplateValidationError";
    this.errors = errors;
  }
}
