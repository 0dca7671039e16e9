/**
 * Protocol error hierarchy.
 *
 * Every failure raised by the protocol is a ProtocolError with a stable
 * `code`, so callers can tell a tampered record from a wrong recipient from
 * a missing grant without parsing messages. Messages never carry plaintext
 * or key material.
 */

export type ProtocolErrorCode =
  | "STRUCTURAL"
  | "MALFORMED_KEY"
  | "AUTH_FAILURE"
  | "UNWRAP_FAILURE"
  | "HASH_MISMATCH"
  | "SIGNATURE_INVALID"
  | "ACCESS_DENIED"
  | "NOT_FOUND";

export abstract class ProtocolError extends Error {
  abstract readonly code: ProtocolErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A document or record contains a value that cannot be canonicalized or decoded. */
export class StructuralError extends ProtocolError {
  readonly code = "STRUCTURAL";
}

/** A key has the wrong type, length or encoding. */
export class MalformedKeyError extends ProtocolError {
  readonly code = "MALFORMED_KEY";
}

/** AEAD tag verification failed: wrong key, corrupted ciphertext or mismatched associated data. */
export class AuthFailureError extends ProtocolError {
  readonly code: "AUTH_FAILURE" | "UNWRAP_FAILURE" = "AUTH_FAILURE";
}

/**
 * A wrapped-key entry could not be opened with the supplied private key.
 * It is an AuthFailureError: the wrap is itself an AEAD ciphertext.
 */
export class UnwrapFailureError extends AuthFailureError {
  override readonly code = "UNWRAP_FAILURE";
}

/** A recomputed content or aggregate hash disagrees with the stored one. */
export class HashMismatchError extends ProtocolError {
  readonly code = "HASH_MISMATCH";
}

/** A signature does not verify against the claimed public key. */
export class SignatureInvalidError extends ProtocolError {
  readonly code = "SIGNATURE_INVALID";
}

/** Neither a direct key-wrap entry nor a valid, matching share record exists for the party. */
export class AccessDeniedError extends ProtocolError {
  readonly code = "ACCESS_DENIED";
}

export type MissingResource = "party" | "document" | "share" | "section";

export class NotFoundError extends ProtocolError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly resource: MissingResource,
    readonly id: string,
    options?: ErrorOptions
  ) {
    super(`${resource} not found: ${id}`, options);
  }
}

export function isProtocolError(value: unknown): value is ProtocolError {
  return value instanceof ProtocolError;
}
