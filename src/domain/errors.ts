// src/domain/errors.ts

export type NutritionErrorKind =
  | "InvalidAmount"
  | "MalformedBackup"
  | "UnsupportedVersion"
  | "StorageFailure"
  | "NotFound";

export class NutritionError extends Error {
  readonly kind: NutritionErrorKind;

  constructor(kind: NutritionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

/** Zero, negative or non-finite amount where a divisor or scale is needed. */
export class InvalidAmountError extends NutritionError {
  constructor(message: string) {
    super("InvalidAmount", message);
  }
}

export class MalformedBackupError extends NutritionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("MalformedBackup", message);
    this.issues = issues;
  }
}

export class UnsupportedVersionError extends NutritionError {
  readonly version: number;

  constructor(version: number) {
    super("UnsupportedVersion", `Backup version ${version} is not supported`);
    this.version = version;
  }
}

export class StorageFailureError extends NutritionError {
  constructor(message: string, cause?: unknown) {
    super("StorageFailure", message, { cause });
  }
}

export class NotFoundError extends NutritionError {
  constructor(what: string, id: string) {
    super("NotFound", `${what} ${id} not found`);
  }
}

export function isNutritionError(err: unknown): err is NutritionError {
  return err instanceof NutritionError;
}
