import { Data } from "effect"

export class FormatError extends Data.TaggedError("FormatError")<{
  readonly operation: string
  readonly message: string
}> {}

export class ResourceError extends Data.TaggedError("ResourceError")<{
  readonly resource: string
  readonly message: string
}> {}

export class ValueError extends Data.TaggedError("ValueError")<{
  readonly message: string
}> {}

export type BytekitError = FormatError | ResourceError | ValueError

// Thrown platform values are normalized before they reach an error constructor.
export const describeThrown = <E>(error: E): string => error instanceof Error ? error.message : String(error)
