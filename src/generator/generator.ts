import { z } from "@/schema"
import { DefinitionConversionError, GenerationError, RootConversionError } from "@/errors"
import { SchemaBuilder } from "@/generator/builder"
import { DEFAULT_SCHEMA, JSONSchema } from "@/generator/document"
import { DefinitionRegistry } from "@/generator/registry"
import type { GeneratorOptions, SchemaNode } from "@/generator/types"

const GeneratorOptionsSchema = z.object({
  schema: z
    .string()
    .optional()
    .transform((value) => value || DEFAULT_SCHEMA),
  strict: z.boolean().default(false),
})

function isDefinitionPairs(value: object): value is Iterable<[string, z.ZodType]> {
  return Symbol.iterator in value
}

/**
 * Result of `SchemaGenerator#safeGenerate()`
 */
export type GenerateResult = { success: true; data: JSONSchema } | { success: false; error: GenerationError }

/**
 * Generates JSON Schema documents from Zod schemas.
 *
 * A generator can be configured once and generate any number of times; each
 * call builds a new, independent document.
 *
 * @example
 * ```ts
 * const Item = z.object({ foo: z.string().tag({ required: true }) })
 * const Order = z.object({ items: z.array(Item) })
 *
 * const schema = new SchemaGenerator().withRoot(Order).withDefinition("item", Item).generate()
 * // { "$schema": "...", "definitions": { "item": {...} },
 * //   "type": "object", "properties": { "items": { "type": "array", "items": { "$ref": "#/definitions/item" } } } }
 * ```
 */
export class SchemaGenerator {
  private _root: z.ZodType | undefined
  private _definitions: Map<string, z.ZodType> = new Map()
  private readonly _schema: string
  private readonly _strict: boolean

  constructor(options: GeneratorOptions = {}) {
    const { schema, strict } = GeneratorOptionsSchema.parse(options)
    this._schema = schema
    this._strict = strict
  }

  /**
   * Set the schema described at the top level of the document
   * @returns this for method chaining
   */
  withRoot(root: z.ZodType): this {
    this._root = root
    return this
  }

  /**
   * Add named definitions, as a record or as [name, schema] pairs
   * @returns this for method chaining
   */
  withDefinitions(definitions: Record<string, z.ZodType> | Iterable<[string, z.ZodType]>): this {
    const entries = isDefinitionPairs(definitions) ? definitions : Object.entries(definitions)
    for (const [name, schema] of entries) {
      this.withDefinition(name, schema)
    }
    return this
  }

  /**
   * Add a named definition. Object schemas of the same type are emitted as
   * `{"$ref": "#/definitions/<name>"}` everywhere else in the document.
   * @returns this for method chaining
   * @throws Error if the name is empty
   */
  withDefinition(name: string, schema: z.ZodType): this {
    if (!name) {
      throw new Error("Definition name must not be empty")
    }
    this._definitions.set(name, schema)
    return this
  }

  /**
   * Generate the document
   * @throws GenerationError listing every definition (or the root) that failed
   */
  generate(): JSONSchema {
    const result = this.safeGenerate()
    if (!result.success) {
      throw result.error
    }
    return result.data
  }

  /**
   * Generate the document without throwing
   */
  safeGenerate(): GenerateResult {
    const registry = new DefinitionRegistry()
    for (const [name, schema] of this._definitions) {
      registry.register(name, schema)
    }
    registry.seal()

    const builder = new SchemaBuilder(registry, { strict: this._strict })
    const errors: (RootConversionError | DefinitionConversionError)[] = []

    const definitions = new Map<string, SchemaNode>()
    for (const { name, schema } of registry.values()) {
      try {
        definitions.set(name, builder.build(schema, true))
      } catch (err) {
        errors.push(new DefinitionConversionError(name, err))
      }
    }

    let root: SchemaNode | undefined
    if (this._root) {
      try {
        root = builder.build(this._root, false)
      } catch (err) {
        errors.push(new RootConversionError(err))
      }
    }

    if (errors.length > 0) {
      return { success: false, error: new GenerationError(errors) }
    }
    return { success: true, data: new JSONSchema(this._schema, definitions, root) }
  }
}

/**
 * Generate the document for a single schema
 * @param root - The schema to describe
 * @param options - Generator options
 * @throws GenerationError if the schema cannot be converted
 */
export function generateJsonSchema(root: z.ZodType, options?: GeneratorOptions): JSONSchema {
  return new SchemaGenerator(options).withRoot(root).generate()
}
