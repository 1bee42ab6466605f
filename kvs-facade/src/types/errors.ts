/**
 * Errors raised by the facade itself.
 *
 * Failures coming back from AWS (SDK `ServiceException` subclasses) are never
 * wrapped: they reach the caller exactly as the SDK produced them.
 */

/**
 * Base class for every facade-originated error.
 */
export class KinesisVideoFacadeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The operation name is not known to any service surface.
 */
export class NoSuchOperationError extends KinesisVideoFacadeError {
  public readonly operationName: string;

  constructor(operationName: string, detail?: string) {
    super(`Unknown operation "${operationName}"${detail ? `: ${detail}` : ''}`);
    this.operationName = operationName;
  }
}

/**
 * The caller used the API wrong. Always raised before any network call.
 */
export class ConfigurationError extends KinesisVideoFacadeError {}

/**
 * Two surfaces advertise the same operation name.
 */
export class OperationCollisionError extends ConfigurationError {
  public readonly operationName: string;
  public readonly existingOwner: string;
  public readonly newOwner: string;

  constructor(operationName: string, existingOwner: string, newOwner: string) {
    super(
      `Operation "${operationName}" is provided by both "${existingOwner}" and "${newOwner}"`
    );
    this.operationName = operationName;
    this.existingOwner = existingOwner;
    this.newOwner = newOwner;
  }
}

/**
 * The control plane answered without the field the facade needs.
 */
export class UnexpectedResponseError extends KinesisVideoFacadeError {
  public readonly operationName: string;

  constructor(operationName: string, missingField: string) {
    super(`${operationName} response did not include ${missingField}`);
    this.operationName = operationName;
  }
}
