/**
 * zod-struct-schema
 *
 * Generates JSON Schema documents from Zod object schemas annotated with `.tag()`.
 * Object schemas registered as definitions are emitted once and referenced by `$ref`.
 *
 * @example
 * ```ts
 * import { z, SchemaGenerator } from 'zod-struct-schema'
 *
 * const Child = z.object({
 *   foo: z.string().tag({ required: true }),
 * })
 *
 * const Parent = z.object({
 *   '#meta': z.never().optional().tag({ title: 'Parent', description: 'A parent with one child' }),
 *   name: z.string().tag({ minLength: 3, maxLength: 10 }),
 *   child: Child,
 *   note: z.string().tag({ omitEmpty: true }),
 *   secret: z.string().tag({ name: '-' }),
 * })
 *
 * const schema = new SchemaGenerator().withRoot(Parent).withDefinition('child', Child).generate()
 * console.log(schema.toString())
 * // {
 * //   "$schema": "http://json-schema.org/schema#",
 * //   "definitions": { "child": { "type": "object", "properties": { "foo": { "type": "string" } }, "required": ["foo"] } },
 * //   "type": "object",
 * //   "properties": {
 * //     "name": { "type": "string", "maxLength": 10, "minLength": 3 },
 * //     "child": { "$ref": "#/definitions/child" },
 * //     "note": { "type": "string" }
 * //   },
 * //   "description": "A parent with one child",
 * //   "title": "Parent"
 * // }
 * ```
 */

// Schema - re-export Zod with the tag() extension
export * from "./schema"

// Generator
export * from "./generator"

// Errors
export * from "./errors"

// Utilities
export { unwrapSchema } from "./utils"
