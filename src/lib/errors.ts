/**
 * Raised for caller-fixable precondition failures: a negative length or
 * decimal count, inverted random bounds, an Invalid Date or an unknown
 * date-fns pattern token. Nothing else in this package throws.
 */
export class InvalidArgumentError extends Error {
  argument: string
  value: unknown

  constructor(argument: string, value: unknown, reason: string) {
    super(`Invalid ${argument} (${String(value)}): ${reason}`)
    this.name = 'InvalidArgumentError'
    this.argument = argument
    this.value = value
  }
}

/** Message text of an unknown thrown value, for warning logs. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
