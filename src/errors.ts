/**
 * Get a message from a thrown value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Base class for every failure raised while converting a schema.
 *
 * Errors are raised where the malformed annotation is found and wrapped on the
 * way up with the field, then the definition (or root) they belong to.
 */
export class ConversionError extends Error {
  override name = "ConversionError"

  /** The wrapped error, if any */
  public override readonly cause: unknown

  constructor(message: string, cause?: unknown) {
    super(message)
    this.cause = cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * A default was given on a field whose JSON type cannot carry one
 */
export class UnsupportedDefaultTypeError extends ConversionError {
  override name = "UnsupportedDefaultTypeError"

  constructor(
    public readonly type: string | undefined,
    public readonly property: string,
  ) {
    super(`default not supported for type "${type ?? ""}" on property "${property}"`)
  }
}

/**
 * A default literal does not parse as the field's JSON type
 */
export class DefaultParseError extends ConversionError {
  override name = "DefaultParseError"

  constructor(
    public readonly value: string,
    public readonly type: string,
    public readonly property: string,
  ) {
    super(`could not parse default ${JSON.stringify(value)} as ${type} for property "${property}"`)
  }
}

/**
 * An extensions payload is not a JSON object
 */
export class ExtensionsParseError extends ConversionError {
  override name = "ExtensionsParseError"

  constructor(
    public readonly value: string,
    public readonly property: string,
    cause?: unknown,
  ) {
    super(`invalid extensions ${JSON.stringify(value)} on property "${property}"${cause ? `: ${describeError(cause)}` : ""}`, cause)
  }
}

/**
 * A validator literal does not parse. Only raised by generators created with `strict: true`
 */
export class InvalidValidatorError extends ConversionError {
  override name = "InvalidValidatorError"

  constructor(
    public readonly keyword: string,
    public readonly value: string,
    public readonly property: string,
  ) {
    super(`could not parse ${keyword} ${JSON.stringify(value)} for property "${property}"`)
  }
}

/**
 * A value in an object shape is not a Zod schema
 */
export class UnsupportedSchemaError extends ConversionError {
  override name = "UnsupportedSchemaError"

  constructor(public readonly value: unknown) {
    super(`not a Zod schema: ${String(value)}`)
  }
}

/**
 * A field of an object failed to convert
 */
export class FieldConversionError extends ConversionError {
  override name = "FieldConversionError"

  /** Number of nested fields from this one down to the innermost failing one */
  readonly depth: number
  /** Message of the innermost error that is not a field error */
  readonly reason: string

  constructor(
    public readonly field: string,
    cause: unknown,
  ) {
    const depth = cause instanceof FieldConversionError ? cause.depth + 1 : 1
    const reason = cause instanceof FieldConversionError ? cause.reason : describeError(cause)
    super(formatFieldMessage(field, cause, depth, reason), cause)
    this.depth = depth
    this.reason = reason
  }

  /**
   * Field keys from this field down to the innermost failing one
   */
  get path(): string[] {
    const path: string[] = []
    let current: unknown = this
    while (current instanceof FieldConversionError) {
      path.push(current.field)
      current = current.cause
    }
    return path
  }
}

const MAX_MESSAGE_FIELDS = 8

/**
 * Format `property "a": property "b": <reason>`, listing at most MAX_MESSAGE_FIELDS fields
 */
function formatFieldMessage(field: string, cause: unknown, depth: number, reason: string): string {
  const fields = [field]
  let current = cause
  while (current instanceof FieldConversionError && fields.length < MAX_MESSAGE_FIELDS) {
    fields.push(current.field)
    current = current.cause
  }
  const segments = fields.map((name) => `property "${name}"`)
  if (depth > fields.length) {
    segments.push(`... ${depth - fields.length} more`)
  }
  return `${segments.join(": ")}: ${reason}`
}

/**
 * The root schema failed to convert
 */
export class RootConversionError extends ConversionError {
  override name = "RootConversionError"
  readonly target = "root"

  constructor(cause: unknown) {
    super(`error on root: ${describeError(cause)}`, cause)
  }
}

/**
 * A registered definition failed to convert
 */
export class DefinitionConversionError extends ConversionError {
  override name = "DefinitionConversionError"

  constructor(
    public readonly target: string,
    cause: unknown,
  ) {
    super(`error on definition "${target}": ${describeError(cause)}`, cause)
  }
}

/**
 * Thrown by `SchemaGenerator#generate()` when the root or any definition failed.
 * Carries one error per failing target.
 */
export class GenerationError extends Error {
  override name = "GenerationError" as const

  constructor(public readonly errors: (RootConversionError | DefinitionConversionError)[]) {
    super(`Schema generation failed: ${errors.map((err) => err.message).join("; ")}`)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError)
    }
  }
}
