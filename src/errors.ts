export class GridlearnError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Invalid layout, hyperparameters or input literals; raised before any episode starts */
export class ConfigurationError extends GridlearnError {}

/** Environment driven out of order: step() without reset(), or after the episode ended */
export class InvalidStateError extends GridlearnError {}
