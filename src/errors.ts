/**
 * Error codes for every failure the library surfaces to callers
 */
export enum ErrorCode {
  INVALID_SECRET_KEY = "INVALID_SECRET_KEY",
  MALFORMED_KEY = "MALFORMED_KEY",
  MALFORMED_SIGNATURE = "MALFORMED_SIGNATURE",
  ID_MISMATCH = "ID_MISMATCH",
  SIGNATURE_INVALID = "SIGNATURE_INVALID",
  URL_PARSE = "URL_PARSE",
  CONNECTION = "CONNECTION",
  ALREADY_CONNECTED = "ALREADY_CONNECTED",
  NOT_FOUND = "NOT_FOUND",
  NO_RELAYS = "NO_RELAYS",
  RELAY_FANOUT = "RELAY_FANOUT",
  KIND_OUT_OF_RANGE = "KIND_OUT_OF_RANGE",
  INVALID_INPUT = "INVALID_INPUT",
  BECH32 = "BECH32",
  NIP05 = "NIP05",
  RELAY_INFO = "RELAY_INFO",
  POW_TIMEOUT = "POW_TIMEOUT",
  CONFIG = "CONFIG",
}

/**
 * Base class for library errors
 */
export class NostrError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidSecretKeyError extends NostrError {
  constructor(message = "Invalid secret key", cause?: unknown) {
    super(message, ErrorCode.INVALID_SECRET_KEY, cause);
  }
}

export type VerificationCode =
  | ErrorCode.MALFORMED_KEY
  | ErrorCode.MALFORMED_SIGNATURE
  | ErrorCode.ID_MISMATCH
  | ErrorCode.SIGNATURE_INVALID;

/**
 * Raised by verifyEvent; the code tells which check failed
 */
export class VerificationError extends NostrError {
  declare readonly code: VerificationCode;

  constructor(message: string, code: VerificationCode) {
    super(message, code);
  }
}

export class UrlParseError extends NostrError {
  constructor(url: string) {
    super(`Invalid relay URL: ${url}`, ErrorCode.URL_PARSE);
  }
}

export class ConnectionError extends NostrError {
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super(`Relay ${url}: ${message}`, ErrorCode.CONNECTION, cause);
    this.url = url;
  }
}

export class AlreadyConnectedError extends NostrError {
  constructor(url: string) {
    super(`Relay ${url} is already in the pool`, ErrorCode.ALREADY_CONNECTED);
  }
}

export class RelayNotFoundError extends NostrError {
  constructor(url: string) {
    super(`Relay ${url} not found in pool`, ErrorCode.NOT_FOUND);
  }
}

export class NoRelaysError extends NostrError {
  constructor(message = "No connected relays") {
    super(message, ErrorCode.NO_RELAYS);
  }
}

/**
 * A frame could not be delivered to some relays. Sends that succeeded are not
 * rolled back.
 */
export class RelayFanoutError extends NostrError {
  readonly delivered: string[];
  readonly failures: Map<string, Error>;

  constructor(action: string, delivered: string[], failures: Map<string, Error>) {
    const failed = Array.from(failures.keys()).join(", ");
    super(
      `Failed to ${action} on ${failures.size} relay(s): ${failed}`,
      ErrorCode.RELAY_FANOUT
    );
    this.delivered = delivered;
    this.failures = failures;
  }
}

export class KindOutOfRangeError extends NostrError {
  constructor(kind: number, max: number) {
    super(`Event kind ${kind} outside range 0-${max}`, ErrorCode.KIND_OUT_OF_RANGE);
  }
}

export class InvalidInputError extends NostrError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_INPUT);
  }
}

export class Bech32Error extends NostrError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.BECH32, cause);
  }
}

export class Nip05Error extends NostrError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.NIP05, cause);
  }
}

export class RelayInfoError extends NostrError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.RELAY_INFO, cause);
  }
}

export class PowTimeoutError extends NostrError {
  constructor(timeoutMs: number) {
    super(
      `PoW mining timed out after ${timeoutMs}ms - difficulty may be too high`,
      ErrorCode.POW_TIMEOUT
    );
  }
}

export class ConfigError extends NostrError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIG);
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
