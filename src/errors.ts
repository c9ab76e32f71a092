/**
 * Error types raised by the verifier.
 *
 * Transport errors are swallowed by the comparison engine (the attempt is
 * skipped), proof errors fail a single asset check, key-fetch errors abort
 * a single category and config errors stop the process before testing.
 */

export class VerifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ─── Transport ───────────────────────────────────────────────────

/** Host could not be reached or the connection failed mid-request */
export class TransportError extends VerifierError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(
      `Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
  }
}

export class ResponseStatusCodeError extends VerifierError {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super(`Response from ${url} has status code ${status}`);
  }
}

export class ResponseDecodeError extends VerifierError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(
      `Response from ${url} is not valid JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
  }
}

// ─── Proof verification ──────────────────────────────────────────

/** A field needed for proof verification is missing or malformed */
export class ResponseFieldError extends VerifierError {
  constructor(public readonly field: string) {
    super(`Cannot get response field ${field}`);
  }
}

export class NullAccountError extends VerifierError {
  constructor(public readonly address: string) {
    super(`Tree account ${address} does not exist`);
  }
}

/** Header or active-tree bytes are inconsistent */
export class TreeLayoutError extends VerifierError {}

export class CanopyError extends VerifierError {}

export class ProofLengthError extends VerifierError {
  constructor(
    public readonly actual: number,
    public readonly expected: number,
  ) {
    super(`Proof has ${actual} nodes after canopy fill, tree depth is ${expected}`);
  }
}

export class LeafIndexOutOfBoundsError extends VerifierError {
  constructor(
    public readonly leafIndex: number,
    public readonly limit: number,
  ) {
    super(`Leaf index ${leafIndex} is out of bounds (limit ${limit})`);
  }
}

// ─── Run setup ───────────────────────────────────────────────────

export class KeysFetchError extends VerifierError {
  constructor(
    public readonly method: string,
    reason: string,
  ) {
    super(`Fetch keys for ${method}: ${reason}`);
  }
}

export class ConfigValidationError extends VerifierError {}
