/** Bad counts, invalid K, unknown methods. Fatal: the run stops immediately. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A malformed input row. The row is skipped and counted; pooling continues. */
export class ValidationError extends Error {
  readonly rowIndex: number;

  constructor(message: string, rowIndex: number) {
    super(message);
    this.name = 'ValidationError';
    this.rowIndex = rowIndex;
  }
}

/** A single classify call failed. Recorded as a null-grade judgment; the batch continues. */
export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

/** A metric cell has no underlying data. Surfaced as missing, never zeroed. */
export class DataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataError';
  }
}

export class JudgmentStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JudgmentStoreError';
  }
}

/** Integrity failure during a labeling run (e.g. the judgment store stopped accepting writes). */
export class LabelingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LabelingError';
  }
}
