/**
 * Raised before sampling when a weir parameter or sampling option cannot
 * produce a curve with strictly increasing, positive heads.
 */
export class InvalidParameterError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`${parameter} ${message}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}
