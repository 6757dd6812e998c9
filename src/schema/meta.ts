import * as z from "zod"

/**
 * A literal annotation value. Numbers and booleans are accepted for convenience
 * and read back as their string form, the same way a string literal would be.
 */
export type TagValue = string | number | boolean

/**
 * Declarative per-field annotations consumed by the schema generator.
 *
 * Validator values are literals: they are parsed against the JSON type of the
 * field they annotate, and only the validators that fit that type are emitted.
 */
export interface SchemaTags {
  /** External property name. `"-"` skips the field entirely */
  name?: string
  /** Add the property to the parent's `required` list */
  required?: boolean
  /** The field may be omitted when empty; always wins over `required` */
  omitEmpty?: boolean
  description?: string
  title?: string
  /** Default value, coerced to the field's JSON type */
  default?: TagValue

  // string validators
  minLength?: TagValue
  maxLength?: TagValue
  pattern?: string
  /** Bar-separated list of allowed values, e.g. `"apple|banana|pear"` */
  enum?: string
  /** Constant value; a string for string fields, a number for numeric fields */
  const?: TagValue

  // number validators
  multipleOf?: TagValue
  minimum?: TagValue
  maximum?: TagValue
  exclusiveMinimum?: TagValue
  exclusiveMaximum?: TagValue

  /**
   * Extra keywords merged verbatim into the property's schema, as JSON text or
   * as a record. Keys sharing a name with a generated keyword replace it.
   * @example '{"enumNames": ["A", "B", "C"]}'
   */
  extensions?: string | Record<string, unknown>
}

/**
 * Metadata stored on Zod schemas for JSON Schema generation
 */
export interface JsonSchemaMeta {
  /** The schema this one was cloned from by `.tag()`; defines its type identity */
  source?: z.ZodType
  tags?: SchemaTags
  /** Marks a `bytes()` schema */
  bytes?: boolean
}

/**
 * Key used to identify our metadata in Zod's meta
 */
const JSON_SCHEMA_META_KEY = "__jsonschema" as const

const TagValueSchema = z.union([z.string(), z.number(), z.boolean()])

const SchemaTagsSchema: z.ZodType<SchemaTags> = z.object({
  name: z.string().optional(),
  required: z.boolean().optional(),
  omitEmpty: z.boolean().optional(),
  description: z.string().optional(),
  title: z.string().optional(),
  default: TagValueSchema.optional(),
  minLength: TagValueSchema.optional(),
  maxLength: TagValueSchema.optional(),
  pattern: z.string().optional(),
  enum: z.string().optional(),
  const: TagValueSchema.optional(),
  multipleOf: TagValueSchema.optional(),
  minimum: TagValueSchema.optional(),
  maximum: TagValueSchema.optional(),
  exclusiveMinimum: TagValueSchema.optional(),
  exclusiveMaximum: TagValueSchema.optional(),
  extensions: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
})

const JsonSchemaMetaSchema: z.ZodType<JsonSchemaMeta> = z.object({
  source: z.custom<z.ZodType>((value) => value instanceof z.ZodType).optional(),
  tags: SchemaTagsSchema.optional(),
  bytes: z.boolean().optional(),
})

// Module augmentation to add tag() to all Zod types
declare module "zod" {
  interface ZodType<
    out Output = unknown,
    out Input = unknown,
    out Internals extends z.core.$ZodTypeInternals<Output, Input> = z.core.$ZodTypeInternals<Output, Input>,
  > {
    /**
     * Attach field annotations used by the JSON Schema generator.
     * Tags accumulate: later calls override the keys they set.
     * Throws a ZodError when a tag value has the wrong type.
     * @example z.string().tag({ name: "fruit", required: true, enum: "apple|banana|pear" })
     */
    tag(tags: SchemaTags): this
  }
}

/**
 * Get our metadata from a Zod schema, or an empty record
 */
function readJsonSchemaMeta(schema: z.ZodType): JsonSchemaMeta {
  const result = JsonSchemaMetaSchema.safeParse(schema.meta()?.[JSON_SCHEMA_META_KEY])
  return result.success ? result.data : {}
}

/**
 * Create a new schema with updated metadata, keeping Zod's own meta (description, title...)
 */
function withJsonSchemaMeta(schema: z.ZodType, update: JsonSchemaMeta): z.ZodType {
  const existingMeta = { ...schema.meta() }
  // Zod rejects a second schema registered under the same id
  delete existingMeta.id
  return schema.meta({
    ...existingMeta,
    [JSON_SCHEMA_META_KEY]: { ...readJsonSchemaMeta(schema), ...update },
  })
}

z.ZodType.prototype.tag = function (this: z.ZodType, tags: SchemaTags) {
  const current = readJsonSchemaMeta(this)
  return withJsonSchemaMeta(this, {
    source: current.source ?? this,
    tags: { ...current.tags, ...SchemaTagsSchema.parse(tags) },
  })
}

/**
 * Get the annotations set directly on this schema (not on wrapped schemas)
 * @param schema - The Zod schema to get the tags from
 * @returns The tags, empty if none were set
 */
export function getOwnTags(schema: z.ZodType): SchemaTags {
  return readJsonSchemaMeta(schema).tags ?? {}
}

/**
 * Get the schema a tagged clone was created from.
 * @param schema - A schema, possibly returned by `.tag()`
 * @returns The original schema, or undefined if the schema was never tagged
 */
export function getSourceSchema(schema: z.ZodType): z.ZodType | undefined {
  return readJsonSchemaMeta(schema).source
}

/**
 * Check if a schema was created by `bytes()`
 */
export function isBytesSchema(schema: z.ZodType): boolean {
  return readJsonSchemaMeta(schema).bytes === true
}

/**
 * Create a byte sequence schema. It accepts a `Uint8Array` (a `Buffer` included)
 * and is described as opaque text (`{"type": "string"}`), never as an array of integers.
 *
 * @example
 * const Upload = z.object({ payload: bytes().tag({ description: "Raw file content" }) })
 */
export function bytes() {
  return z.instanceof(Uint8Array).meta({ [JSON_SCHEMA_META_KEY]: { bytes: true } })
}

// Re-export z with our extension applied
export { z }
