export class SimulationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join("; ")}` : message);
    this.name = "SimulationError";
    this.errors = errors;
  }
}
