import { z, getOwnTags, type SchemaTags, type TagValue } from "@/schema"
import { DefaultParseError, ExtensionsParseError, InvalidValidatorError, UnsupportedDefaultTypeError } from "@/errors"
import { cloneRecord, parseBooleanLiteral, parseFloatLiteral, parseIntegerLiteral } from "@/utils"
import type { BuildOptions, SchemaNode } from "@/generator/types"

/**
 * Structured view of a field's annotations
 */
export interface FieldAnnotation {
  /** External property name */
  name: string
  /** Private fields (`#key`) annotate the enclosing object instead of producing a property */
  hidden: boolean
  required: boolean
  omitEmpty: boolean
  /** Set when a layer of the field is `.optional()` */
  optional: boolean
  description?: string
  title?: string
  tags: SchemaTags
}

/**
 * Get the inner schema of a wrapper that may carry its own tags
 */
function innerLayer(schema: z.ZodType): z.ZodType | undefined {
  let inner: unknown
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    inner = schema.unwrap()
  } else if (schema instanceof z.ZodDefault) {
    inner = schema.removeDefault()
  } else if (schema instanceof z.ZodReadonly) {
    inner = schema.unwrap()
  }
  return inner instanceof z.ZodType ? inner : undefined
}

/**
 * Collect tags from all wrapper layers of a schema, outer layers winning.
 * This handles cases like z.string().tag({ minLength: 3 }).optional().tag({ required: true })
 */
export function collectTags(schema: z.ZodType): SchemaTags {
  const inner = innerLayer(schema)
  const own = getOwnTags(schema)
  return inner ? { ...collectTags(inner), ...own } : own
}

/**
 * Check if any wrapper layer of a schema is optional
 */
function hasOptionalLayer(schema: z.ZodType): boolean {
  if (schema instanceof z.ZodOptional) return true
  const inner = innerLayer(schema)
  return inner ? hasOptionalLayer(inner) : false
}

/**
 * Find the first Zod description or title through the wrapper layers
 */
function zodMetaText(schema: z.ZodType, key: "description" | "title"): string | undefined {
  const value = schema.meta()?.[key]
  if (typeof value === "string" && value) {
    return value
  }
  const inner = innerLayer(schema)
  return inner ? zodMetaText(inner, key) : undefined
}

/**
 * Read the annotation of an object field
 * @param key - The key of the field in the object shape
 * @param schema - The field's schema
 */
export function readFieldAnnotation(key: string, schema: z.ZodType): FieldAnnotation {
  const tags = collectTags(schema)
  return {
    name: tags.name || key,
    hidden: key.startsWith("#"),
    required: tags.required === true,
    omitEmpty: tags.omitEmpty === true,
    optional: hasOptionalLayer(schema),
    description: tags.description ?? zodMetaText(schema, "description"),
    title: tags.title ?? zodMetaText(schema, "title"),
    tags,
  }
}

/**
 * Whether a field belongs in its parent's `required` list.
 * Omit-if-empty (or an optional layer) always wins over the required flag.
 */
export function isRequiredField(annotation: FieldAnnotation): boolean {
  return annotation.required && !annotation.omitEmpty && !annotation.optional
}

/**
 * Stringify a tag value; absent and empty values count as not set
 */
function literal(value: TagValue | undefined): string | undefined {
  if (value === undefined) return undefined
  const text = String(value)
  return text === "" ? undefined : text
}

/**
 * Parses validator literals, leaving out the ones that do not parse unless strict
 */
class ValidatorReader {
  constructor(
    private readonly tags: SchemaTags,
    private readonly property: string,
    private readonly options: BuildOptions,
  ) {}

  read<T>(keyword: keyof SchemaTags & string, parse: (literal: string) => T | undefined): T | undefined {
    const raw = this.tags[keyword]
    const text = typeof raw === "object" ? undefined : literal(raw)
    if (text === undefined) return undefined

    const value = parse(text)
    if (value === undefined && this.options.strict) {
      throw new InvalidValidatorError(keyword, text, this.property)
    }
    return value
  }

  text(keyword: "pattern" | "enum" | "const"): string | undefined {
    return literal(this.tags[keyword])
  }
}

function addStringValidators(node: SchemaNode, reader: ValidatorReader): void {
  node.minLength = reader.read("minLength", parseIntegerLiteral) ?? node.minLength
  node.maxLength = reader.read("maxLength", parseIntegerLiteral) ?? node.maxLength
  node.pattern = reader.text("pattern") ?? node.pattern

  const values = reader.text("enum")
  if (values !== undefined) {
    node.enum = values.split("|")
  }

  node.const = reader.text("const") ?? node.const
}

function addNumberValidators(node: SchemaNode, reader: ValidatorReader): void {
  node.multipleOf = reader.read("multipleOf", parseFloatLiteral) ?? node.multipleOf
  node.minimum = reader.read("minimum", parseFloatLiteral) ?? node.minimum
  node.maximum = reader.read("maximum", parseFloatLiteral) ?? node.maximum
  node.exclusiveMinimum = reader.read("exclusiveMinimum", parseFloatLiteral) ?? node.exclusiveMinimum
  node.exclusiveMaximum = reader.read("exclusiveMaximum", parseFloatLiteral) ?? node.exclusiveMaximum
  node.const = reader.read("const", node.type === "number" ? parseFloatLiteral : parseIntegerLiteral) ?? node.const
}

/**
 * Coerce a default literal to the node's JSON type
 */
function coerceDefault(node: SchemaNode, value: TagValue, property: string): string | number | boolean {
  const text = String(value)
  switch (node.type) {
    case "string":
      return text
    case "number":
    case "integer": {
      const parsed = parseFloatLiteral(text)
      if (parsed === undefined) {
        throw new DefaultParseError(text, "number", property)
      }
      return parsed
    }
    case "boolean": {
      const parsed = parseBooleanLiteral(text)
      if (parsed === undefined) {
        throw new DefaultParseError(text, "boolean", property)
      }
      return parsed
    }
    default:
      throw new UnsupportedDefaultTypeError(node.type, property)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Parse an extensions payload into a record of keywords
 */
function parseExtensions(extensions: string | Record<string, unknown>, property: string): Record<string, unknown> {
  if (typeof extensions !== "string") {
    return cloneRecord(extensions)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(extensions)
  } catch (err) {
    throw new ExtensionsParseError(extensions, property, err)
  }
  if (!isRecord(parsed)) {
    throw new ExtensionsParseError(extensions, property)
  }
  return parsed
}

/**
 * Apply a field annotation to a node: description and title, the validators
 * matching the node's type, the default, then the extensions.
 * @param node - The node built for the field, or the enclosing object for private fields
 * @param annotation - The field annotation
 * @param options - Build options
 */
export function applyAnnotation(node: SchemaNode, annotation: FieldAnnotation, options: BuildOptions): void {
  const { tags, name } = annotation

  node.description = annotation.description ?? node.description
  node.title = annotation.title ?? node.title

  const reader = new ValidatorReader(tags, name, options)
  switch (node.type) {
    case "string":
      addStringValidators(node, reader)
      break
    case "number":
    case "integer":
      addNumberValidators(node, reader)
      break
  }

  if (tags.default !== undefined) {
    node.default = coerceDefault(node, tags.default, name)
  }

  if (tags.extensions !== undefined) {
    node.extensions = parseExtensions(tags.extensions, name)
  }
}
