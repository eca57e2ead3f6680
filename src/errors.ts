/**
 * Structured error classes for the binding layer.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  DECLARATION_FAILED: 'DECLARATION_FAILED',
  ARGUMENT_MISMATCH: 'ARGUMENT_MISMATCH',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  NO_SETTER: 'NO_SETTER',
  REMOTE_CALL_FAILED: 'REMOTE_CALL_FAILED',
  SERVER_DISPATCH_FAILED: 'SERVER_DISPATCH_FAILED',
  BINDING_STATE: 'BINDING_STATE',
  NOT_IMPLEMENTED: 'NOT_IMPLEMENTED',
  DBUS_FAILED: 'DBUS_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Well-known error names defined by the D-Bus specification.
 */
export const DbusErrorName = {
  FAILED: 'org.freedesktop.DBus.Error.Failed',
  INVALID_ARGS: 'org.freedesktop.DBus.Error.InvalidArgs',
  NOT_SUPPORTED: 'org.freedesktop.DBus.Error.NotSupported',
  NO_REPLY: 'org.freedesktop.DBus.Error.NoReply',
  SERVICE_UNKNOWN: 'org.freedesktop.DBus.Error.ServiceUnknown',
  UNKNOWN_OBJECT: 'org.freedesktop.DBus.Error.UnknownObject',
  UNKNOWN_INTERFACE: 'org.freedesktop.DBus.Error.UnknownInterface',
  UNKNOWN_METHOD: 'org.freedesktop.DBus.Error.UnknownMethod',
  UNKNOWN_PROPERTY: 'org.freedesktop.DBus.Error.UnknownProperty',
  PROPERTY_READ_ONLY: 'org.freedesktop.DBus.Error.PropertyReadOnly',
  DISCONNECTED: 'org.freedesktop.DBus.Error.Disconnected',
} as const;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown while registering an interface declaration: bad wire name, bad
 * signature, illegal member redefinition or a non-function declared as method.
 */
export class DeclarationError extends BaseError {
  readonly code = 'DECLARATION_FAILED' as const;
}

/**
 * A wire name does not satisfy the D-Bus naming grammar.
 */
export class InvalidNameError extends DeclarationError {
  constructor(kind: string, name: string) {
    super(`Invalid ${kind} name: ${JSON.stringify(name)}`);
  }
}

/**
 * A type signature does not parse.
 */
export class InvalidSignatureError extends DeclarationError {
  constructor(signature: string, reason: string) {
    super(`Invalid signature ${JSON.stringify(signature)}: ${reason}`);
  }
}

/**
 * A subclass redefines an inherited member without `dbusOverride()`.
 */
export class IllegalOverrideError extends DeclarationError {
  constructor(className: string, key: string, detail: string) {
    super(`${className}.${key}: ${detail}`);
  }
}

/**
 * A method call could not be resolved into a complete positional argument list.
 */
export class ArgumentError extends BaseError {
  readonly code = 'ARGUMENT_MISMATCH' as const;
  readonly dbusErrorName = DbusErrorName.INVALID_ARGS;
}

/**
 * Thrown when a payload does not match its wire signature.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;
  readonly dbusErrorName = DbusErrorName.INVALID_ARGS;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * A set was attempted on a read-only property.
 */
export class NoSetterError extends BaseError {
  readonly code = 'NO_SETTER' as const;

  constructor(propertyName: string) {
    super(`Property has no setter: ${propertyName}`);
  }
}

/**
 * The remote peer answered a call with an error reply.
 */
export class RemoteCallError extends BaseError {
  readonly code = 'REMOTE_CALL_FAILED' as const;
  readonly errorName: string;
  readonly remoteMessage: string;

  constructor(errorName: string, remoteMessage: string) {
    super(`${errorName}: ${remoteMessage}`);
    this.errorName = errorName;
    this.remoteMessage = remoteMessage;
  }

  override toJSON() {
    return { ...super.toJSON(), errorName: this.errorName };
  }
}

/**
 * A local implementation failed while serving an incoming call.
 */
export class ServerDispatchError extends BaseError {
  readonly code = 'SERVER_DISPATCH_FAILED' as const;
  readonly dbusErrorName: string;
  readonly originalError: unknown;

  constructor(member: string, originalError: unknown) {
    super(`${member} failed: ${describe(originalError)}`);
    this.originalError = originalError;
    this.dbusErrorName = getDbusErrorName(originalError) ?? DbusErrorName.FAILED;
  }

  /**
   * Text sent back to the caller in the error reply.
   */
  get replyText(): string {
    return describe(this.originalError);
  }
}

/**
 * Illegal binding transition, or a remote operation that cannot be addressed.
 */
export class BindingStateError extends BaseError {
  readonly code = 'BINDING_STATE' as const;
}

/**
 * Local stub of a member that only a remote peer implements.
 */
export class NotImplementedError extends BaseError {
  readonly code = 'NOT_IMPLEMENTED' as const;
  readonly dbusErrorName = DbusErrorName.NOT_SUPPORTED;

  constructor(member: string) {
    super(`Not implemented locally: ${member}`);
  }
}

/**
 * Base for application errors that travel as a named D-Bus error.
 *
 * @example
 * ```ts
 * class QuotaExceededError extends DbusFailedError {
 *   override readonly dbusErrorName = 'org.example.Error.QuotaExceeded';
 * }
 * ```
 */
export class DbusFailedError extends BaseError {
  readonly code = 'DBUS_FAILED' as const;
  readonly dbusErrorName: string = DbusErrorName.FAILED;
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Extract the D-Bus error name an error wants to be sent as.
 */
export function getDbusErrorName(err: unknown): string | undefined {
  if (err instanceof Error && 'dbusErrorName' in err && typeof err.dbusErrorName === 'string') {
    return err.dbusErrorName;
  }
  return undefined;
}
