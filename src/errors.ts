/**
 * Errors raised at the host boundary.
 * Contracts never throw these; the host, codec and storage layers do.
 */
export class HostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A value lies outside the closed range of its declared type */
export class DomainViolationError extends HostError {
  constructor(
    readonly label: string,
    readonly value: bigint,
    readonly min: bigint,
    readonly max: bigint
  ) {
    super(`Value ${value} for '${label}' is outside the range [${min}, ${max}]`);
  }
}

/** Calldata or return data that cannot be decoded */
export class CalldataError extends HostError {}

export class UnknownSelectorError extends HostError {
  constructor(readonly selector: string) {
    super(`No public function matches selector ${selector}`);
  }
}

/** A call arrived while another call was still executing */
export class HostBusyError extends HostError {
  constructor(readonly pending: string) {
    super(`Host is executing '${pending}'; calls must be sequential`);
  }
}

export class StorageError extends HostError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
