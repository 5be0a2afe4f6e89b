export class FlipEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Source sheet does not match the positional column layout
export class DataFormatError extends FlipEngineError {
  readonly columnCount?: number;
  readonly rowNumber?: number;

  constructor(message: string, details: { columnCount?: number; rowNumber?: number } = {}) {
    super(message);
    this.columnCount = details.columnCount;
    this.rowNumber = details.rowNumber;
  }
}

export class LocalityNotFoundError extends FlipEngineError {
  readonly locality: string;

  constructor(locality: string) {
    super(`Locality '${locality}' not found in market data`);
    this.locality = locality;
  }
}
