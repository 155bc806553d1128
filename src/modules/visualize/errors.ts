export class VisualizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisualizerError';
  }
}

export class RecordLoadError extends VisualizerError {
  constructor(message: string) {
    super(message);
    this.name = 'RecordLoadError';
  }
}

export class MissingFieldError extends VisualizerError {
  readonly field: string;
  readonly index: number;

  constructor(field: string, index: number) {
    super(`Tweet record ${index} is missing field "${field}"`);
    this.name = 'MissingFieldError';
    this.field = field;
    this.index = index;
  }
}
