import { z, isBytesSchema } from "@/schema"
import { FieldConversionError, UnsupportedSchemaError } from "@/errors"
import { applyAnnotation, isRequiredField, readFieldAnnotation } from "@/generator/tags"
import type { DefinitionLookup } from "@/generator/registry"
import type { BuildOptions, JSONType, SchemaNode } from "@/generator/types"

/**
 * Kinds of types the walker distinguishes
 */
export type TypeKind =
  | "boolean"
  | "integer"
  | "number"
  | "string"
  | "datetime"
  | "enum"
  | "bytes"
  | "array"
  | "map"
  | "object"
  | "nullable"
  | "wrapper"
  | "opaque"

interface KindMapping {
  type?: JSONType
  format?: string
}

const kindMapping: Record<TypeKind, KindMapping> = {
  boolean: { type: "boolean" },
  integer: { type: "integer" },
  number: { type: "number" },
  string: { type: "string" },
  datetime: { type: "string", format: "date-time" },
  enum: { type: "string" },
  bytes: { type: "string" },
  array: { type: "array" },
  map: { type: "object" },
  object: { type: "object" },
  nullable: {},
  wrapper: {},
  opaque: {},
}

const primitiveKinds = new Set<TypeKind>(["boolean", "integer", "number", "string", "datetime", "enum"])

/**
 * Check if a kind is a primitive that a nullable wrapper encodes as `anyOf`
 */
export function isPrimitiveKind(kind: TypeKind): boolean {
  return primitiveKinds.has(kind)
}

/**
 * Check if a numeric schema only accepts integers (`.int()`, `z.int32()`...)
 */
function isIntegerNumber(schema: z.ZodNumber): boolean {
  return schema.format !== null && schema.format.includes("int")
}

/**
 * Resolve the kind of a schema
 */
export function kindOf(schema: z.ZodType): TypeKind {
  if (isBytesSchema(schema)) return "bytes"

  if (schema instanceof z.ZodBoolean) return "boolean"
  if (schema instanceof z.ZodBigInt) return "integer"
  if (schema instanceof z.ZodNumber) return isIntegerNumber(schema) ? "integer" : "number"
  if (schema instanceof z.ZodDate) return "datetime"
  if (schema instanceof z.ZodString || schema instanceof z.ZodStringFormat) {
    return schema.format === "datetime" ? "datetime" : "string"
  }
  if (schema instanceof z.ZodEnum) return "enum"

  if (schema instanceof z.ZodArray) return "array"
  if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap) return "map"
  if (schema instanceof z.ZodObject) return "object"

  if (schema instanceof z.ZodNullable) return "nullable"
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault || schema instanceof z.ZodReadonly || schema instanceof z.ZodLazy) {
    return "wrapper"
  }

  return "opaque"
}

/**
 * Get the `{type, format}` pair of a schema from the kind mapping
 */
export function typeFromMapping(schema: z.ZodType): KindMapping & { kind: TypeKind } {
  const kind = kindOf(schema)
  return { ...kindMapping[kind], kind }
}

/**
 * Narrow a value found inside a schema definition to a Zod schema
 */
function asZodType(value: unknown): z.ZodType {
  if (value instanceof z.ZodType) {
    return value
  }
  console.error("[jsonschema] Provided schema is not a valid Zod type:", value)
  throw new UnsupportedSchemaError(value)
}

/**
 * Get the schema a nullable or transparent wrapper wraps
 */
function unwrapLayer(schema: z.ZodType): z.ZodType {
  if (schema instanceof z.ZodDefault) {
    return asZodType(schema.removeDefault())
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodReadonly || schema instanceof z.ZodLazy) {
    return asZodType(schema.unwrap())
  }
  return schema
}

/**
 * Recursive type walker turning Zod schemas into schema nodes.
 *
 * Composite types registered as definitions are emitted as `$ref` nodes,
 * unless they are the body of their own definition.
 *
 * Recursive types only terminate when registered as definitions: an
 * unregistered cycle recurses until the runtime throws a RangeError.
 */
export class SchemaBuilder {
  constructor(
    private readonly definitions: DefinitionLookup,
    private readonly options: BuildOptions,
  ) {}

  /**
   * Build the node for a schema
   * @param schema - The schema to convert
   * @param isDefinitionRoot - true when building the body of a definition, which must be inlined
   * @returns A new node tree
   */
  build(schema: z.ZodType, isDefinitionRoot: boolean): SchemaNode {
    const { kind, type, format } = typeFromMapping(schema)
    const node: SchemaNode = {}
    if (type) node.type = type
    if (format) node.format = format

    switch (kind) {
      case "enum":
        return this.readEnum(node, schema)
      case "array":
        return this.readArray(node, schema)
      case "map":
        return this.readMap(node, schema)
      case "object":
        return this.readObject(node, schema, isDefinitionRoot)
      case "nullable":
        return this.readNullable(schema, isDefinitionRoot)
      case "wrapper":
        return this.build(unwrapLayer(schema), isDefinitionRoot)
      default:
        return node
    }
  }

  private readEnum(node: SchemaNode, schema: z.ZodType): SchemaNode {
    if (schema instanceof z.ZodEnum) {
      const values = schema.options.filter((option): option is string => typeof option === "string")
      if (values.length > 0) node.enum = values
    }
    return node
  }

  /**
   * Nullable primitives become `anyOf: [<primitive>, {type: "null"}]`.
   * Anything else is built as if the wrapper were not there.
   */
  private readNullable(schema: z.ZodType, isDefinitionRoot: boolean): SchemaNode {
    const inner = unwrapLayer(schema)
    const node = this.build(inner, isDefinitionRoot)
    if (!isPrimitiveKind(kindOf(inner))) {
      return node
    }
    return { anyOf: [node, { type: "null" }] }
  }

  private readArray(node: SchemaNode, schema: z.ZodType): SchemaNode {
    if (!(schema instanceof z.ZodArray)) return node

    const element = asZodType(schema.element)
    // Arrays of fully dynamic values have no items schema
    if (kindOf(element) !== "opaque") {
      node.items = this.build(element, false)
    }
    return node
  }

  /**
   * Maps with a value type from the kind mapping describe their values under a
   * `".*"` property; any other map allows additional properties.
   */
  private readMap(node: SchemaNode, schema: z.ZodType): SchemaNode {
    if (!(schema instanceof z.ZodRecord || schema instanceof z.ZodMap)) return node

    const { type, format } = typeFromMapping(asZodType(schema.valueType))
    if (type) {
      const value: SchemaNode = { type }
      if (format) value.format = format
      node.properties = new Map([[".*", value]])
    } else {
      node.additionalProperties = true
    }
    return node
  }

  private readObject(node: SchemaNode, schema: z.ZodType, isDefinitionRoot: boolean): SchemaNode {
    if (!(schema instanceof z.ZodObject)) return node

    if (!isDefinitionRoot) {
      const ref = this.definitions.reference(schema)
      if (ref) {
        return { ref }
      }
    }

    node.type = "object"
    node.properties = new Map()
    node.additionalProperties = false

    for (const [key, value] of Object.entries(schema.shape)) {
      const field = asZodType(value)
      const annotation = readFieldAnnotation(key, field)

      let target: SchemaNode
      if (annotation.hidden) {
        // not a property, tags apply to the object itself
        target = node
      } else {
        if (annotation.name === "-") continue
        try {
          target = this.build(field, false)
        } catch (err) {
          throw new FieldConversionError(key, err)
        }
        node.properties.set(annotation.name, target)
      }

      applyAnnotation(target, annotation, this.options)

      if (!annotation.hidden && isRequiredField(annotation)) {
        node.required ??= []
        if (!node.required.includes(annotation.name)) {
          node.required.push(annotation.name)
        }
      }
    }

    return node
  }
}
