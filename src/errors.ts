export class TrafficGenError extends Error {
  code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'TrafficGenError';
    this.code = code;
  }
}

/**
 * Raised when an override puts a scalar where the defaults hold a mapping.
 */
export class ConfigMergeError extends TrafficGenError {
  path: string;

  constructor(path: string) {
    super(`Cannot merge scalar override into mapping at '${path}'`, 'MERGE_TYPE_MISMATCH');
    this.name = 'ConfigMergeError';
    this.path = path;
  }
}

export class TrafficConfigError extends TrafficGenError {
  constructor(message: string) {
    super(message, 'INVALID_TRAFFIC_CONFIG');
    this.name = 'TrafficConfigError';
  }
}

export class OperatorInputClosedError extends TrafficGenError {
  constructor() {
    super('Operator input closed before a result was entered', 'INPUT_CLOSED');
    this.name = 'OperatorInputClosedError';
  }
}
