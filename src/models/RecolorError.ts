/**
 * Startup-time validation errors.
 *
 * Every error here is raised before the first input line is read and is
 * fatal for the run. Line processing itself has no error path.
 */

export type RecolorErrorKind =
  | 'InvalidPattern'
  | 'MalformedOverride'
  | 'UnknownStyleToken'
  | 'DuplicateOverrideKey';

export abstract class RecolorError extends Error {
  abstract readonly kind: RecolorErrorKind;
}

/**
 * The user-supplied regular expression does not compile.
 */
export class InvalidPatternError extends RecolorError {
  readonly kind = 'InvalidPattern' as const;

  constructor(
    public readonly pattern: string,
    public readonly reason: string
  ) {
    super(`invalid pattern "${pattern}": ${reason}`);
    this.name = 'InvalidPatternError';
  }
}

/**
 * A style override argument is not of the form `key=style[,style...]`.
 */
export class MalformedOverrideError extends RecolorError {
  readonly kind = 'MalformedOverride' as const;

  constructor(
    public readonly argument: string,
    public readonly reason: string
  ) {
    super(`malformed style override "${argument}": ${reason}`);
    this.name = 'MalformedOverrideError';
  }
}

export class UnknownStyleTokenError extends RecolorError {
  readonly kind = 'UnknownStyleToken' as const;

  constructor(public readonly token: string) {
    super(`unknown style "${token}"`);
    this.name = 'UnknownStyleTokenError';
  }
}

export class DuplicateOverrideKeyError extends RecolorError {
  readonly kind = 'DuplicateOverrideKey' as const;

  constructor(
    public readonly key: string | number,
    public readonly argument: string
  ) {
    super(`duplicate style override for group "${key}" in "${argument}"`);
    this.name = 'DuplicateOverrideKeyError';
  }
}

export function isRecolorError(err: unknown): err is RecolorError {
  return err instanceof RecolorError;
}
