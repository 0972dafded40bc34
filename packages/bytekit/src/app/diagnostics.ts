export type LoggableError =
  | Error
  | string
  | {
    readonly _tag?: string
    readonly message?: string
    readonly operation?: string
    readonly resource?: string
  }

type TaggedError = {
  readonly _tag?: string
  readonly message?: string
  readonly operation?: string
  readonly resource?: string
}

const hasTag = (error: LoggableError): error is TaggedError => typeof error !== "string" && "_tag" in error

const formatOperation = (error: TaggedError): string => error.operation ? ` operation=${error.operation}` : ""

const formatResource = (error: TaggedError): string => error.resource ? ` resource=${error.resource}` : ""

const formatTaggedError = (error: TaggedError): string => {
  const tag = error._tag ?? "UnknownError"
  const message = error.message ?? ""
  const base = message ? `${tag}: ${message}` : tag
  return `${base}${formatOperation(error)}${formatResource(error)}`
}

// CHANGE: render library errors as single log lines
// WHY: tagged errors carry their context in fields that default formatting drops
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall e: formatError(e) starts with e._tag when e is tagged
// PURITY: CORE
// INVARIANT: untagged errors render as `name: message`
// COMPLEXITY: O(1)/O(1)
export const formatError = (error: LoggableError): string => {
  if (typeof error === "string") {
    return error
  }
  if (hasTag(error)) {
    return formatTaggedError(error)
  }
  return `${error.name}: ${error.message}`
}
