/**
 * JSON types a schema node can declare
 */
export type JSONType = "object" | "array" | "string" | "number" | "integer" | "boolean" | "null"

export type DefaultValue = string | number | boolean

/**
 * One node of the generated schema tree. Children are owned by their parent;
 * definitions are only ever reached through `ref`.
 */
export interface SchemaNode {
  type?: JSONType
  format?: string
  items?: SchemaNode
  /** Property name -> schema, in declaration order */
  properties?: Map<string, SchemaNode>
  required?: string[]
  additionalProperties?: boolean
  description?: string
  anyOf?: SchemaNode[]
  oneOf?: SchemaNode[]
  dependencies?: Map<string, SchemaNode>
  default?: DefaultValue

  // number validators
  multipleOf?: number
  maximum?: number
  minimum?: number
  exclusiveMaximum?: number
  exclusiveMinimum?: number

  // string validators
  maxLength?: number
  minLength?: number
  pattern?: string
  enum?: string[]
  title?: string
  /** Implemented for strings and numbers */
  const?: string | number
  /** Pointer to a definition, e.g. `#/definitions/item`. A node with a ref carries nothing else */
  ref?: string

  /** Extra keywords emitted at this node's level, overriding generated ones */
  extensions?: Record<string, unknown>
}

/**
 * Emitted JSON form of a schema node
 */
export type JsonSchemaObject = Record<string, unknown>

/**
 * Generator options
 */
export interface GeneratorOptions {
  /** Dialect URI emitted as `$schema`; empty means the default */
  schema?: string
  /** Reject validator literals that do not parse instead of leaving them out */
  strict?: boolean
}

/**
 * Options the type walker and the annotation extractor run with
 */
export interface BuildOptions {
  strict: boolean
}
