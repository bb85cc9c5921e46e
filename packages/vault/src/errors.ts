/**
 * Vault errors.
 *
 * Every rejection the vault makes is a VaultError with a stable code.
 * Oracle failures are not wrapped: they surface as OracleError from
 * @strongroom/price-oracle.
 */

export type VaultErrorCode =
  | "ZERO_AMOUNT"
  | "PER_TRANSACTION_LIMIT_EXCEEDED"
  | "INSUFFICIENT_BALANCE"
  | "GLOBAL_LIMIT_EXCEEDED"
  | "BANK_CAPITAL_EXCEEDED"
  | "SETTLEMENT_FAILED"
  | "REENTRANT_CALL"
  | "UNAUTHORIZED"
  | "UNSUPPORTED_ASSET";

export class VaultError extends Error {
  readonly code: VaultErrorCode;
  readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: VaultErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

/**
 * The `code` of any structured error, or undefined for plain errors.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
