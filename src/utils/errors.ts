/** Base class for every error this package throws on purpose */
export class EafError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input is malformed or out of range */
export class InvalidArgumentError extends EafError {}

/** The XML does not have the shape of an .eaf document */
export class FormatError extends EafError {}

/** A TIER tag was handed to the wrong class (Tier vs Subtier) */
export class WrongVariantError extends EafError {}

/** A referent that must exist (parent tier, time slot, segment) is missing */
export class NotFoundError extends EafError {}

/** Several segments share an id; the store can no longer be trusted */
export class CorruptionError extends EafError {}

export class FileExistsError extends EafError {
  constructor(readonly file: string) {
    super(`${file} already exists; pass overwrite to replace it`);
  }
}

/** Format a thrown value for messages */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
