import { describe, it, expect } from "vitest"
import { z } from "@/schema"
import { SchemaGenerator, generateJsonSchema } from "@/generator/generator"
import { DEFAULT_SCHEMA, JSONSchema } from "@/generator/document"
import { ConversionError, DefinitionConversionError, FieldConversionError, GenerationError, InvalidValidatorError, RootConversionError } from "@/errors"

const Note = z.object({
  data: z.string().tag({ required: true }),
  note: z.string().tag({ omitEmpty: true }),
})

const Item = z.object({ foo: z.string().tag({ required: true }) })

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

describe("generateJsonSchema", () => {
  it("should describe a single object", () => {
    expect(generateJsonSchema(Note).toJSON()).toEqual({
      $schema: "http://json-schema.org/schema#",
      type: "object",
      properties: {
        data: { type: "string" },
        note: { type: "string" },
      },
      required: ["data"],
    })
  })

  it("should render the document as indented JSON", () => {
    const expected = [
      "{",
      '  "$schema": "http://json-schema.org/schema#",',
      '  "type": "object",',
      '  "properties": {',
      '    "data": {',
      '      "type": "string"',
      "    },",
      '    "note": {',
      '      "type": "string"',
      "    }",
      "  },",
      '  "required": [',
      '    "data"',
      "  ]",
      "}",
    ].join("\n")

    expect(generateJsonSchema(Note).toString()).toBe(expected)
  })

  it("should accept non-object roots", () => {
    expect(generateJsonSchema(z.boolean()).toString()).toBe('{\n  "$schema": "http://json-schema.org/schema#",\n  "type": "boolean"\n}')
    expect(generateJsonSchema(z.array(z.string())).toJSON()).toEqual({
      $schema: DEFAULT_SCHEMA,
      type: "array",
      items: { type: "string" },
    })
  })

  it("should use the configured dialect URI", () => {
    const uri = "https://json-schema.org/draft/2020-12/schema"

    expect(generateJsonSchema(z.string(), { schema: uri }).toJSON()).toEqual({ $schema: uri, type: "string" })
    expect(generateJsonSchema(z.string(), { schema: "" }).schema).toBe(DEFAULT_SCHEMA)
  })
})

describe("SchemaGenerator", () => {
  describe("definitions", () => {
    const GrandParent = z.object({ name: z.string() })
    const Parent = z.object({ grandParent: GrandParent, name: z.string() })
    const Child = z.object({ parent: Parent, name: z.string() })

    it("should emit definitions and reference them", () => {
      const schema = new SchemaGenerator().withRoot(Child).withDefinitions({ grandparent: GrandParent, parent: Parent }).generate()

      expect(schema.toJSON()).toEqual({
        $schema: DEFAULT_SCHEMA,
        definitions: {
          grandparent: { type: "object", properties: { name: { type: "string" } } },
          parent: {
            type: "object",
            properties: {
              grandParent: { $ref: "#/definitions/grandparent" },
              name: { type: "string" },
            },
          },
        },
        type: "object",
        properties: {
          parent: { $ref: "#/definitions/parent" },
          name: { type: "string" },
        },
      })
    })

    it("should place $schema and definitions before the root keywords", () => {
      const schema = new SchemaGenerator().withRoot(Child).withDefinitions({ grandparent: GrandParent, parent: Parent }).generate()

      expect(Object.keys(schema.toJSON())).toEqual(["$schema", "definitions", "type", "properties"])
    })

    it("should generate definitions without a root", () => {
      const schema = new SchemaGenerator()
        .withDefinition("item", Item.nullable())
        .withDefinition("list", z.object({ items: z.array(Item.nullable()) }))
        .generate()

      expect(schema.root).toBeUndefined()
      expect(schema.toJSON()).toEqual({
        $schema: DEFAULT_SCHEMA,
        definitions: {
          item: { type: "object", properties: { foo: { type: "string" } }, required: ["foo"] },
          list: {
            type: "object",
            properties: { items: { type: "array", items: { $ref: "#/definitions/item" } } },
          },
        },
      })
    })

    it("should reference a root that is itself a definition", () => {
      const schema = new SchemaGenerator().withRoot(Item).withDefinition("item", Item).generate()

      expect(schema.toJSON()).toEqual({
        $schema: DEFAULT_SCHEMA,
        definitions: {
          item: { type: "object", properties: { foo: { type: "string" } }, required: ["foo"] },
        },
        $ref: "#/definitions/item",
      })
    })

    it("should reject empty definition names where they are added", () => {
      expect(() => new SchemaGenerator().withDefinition("", Item)).toThrow("Definition name must not be empty")
      expect(() => new SchemaGenerator().withDefinitions({ "": Item })).toThrow("Definition name must not be empty")
    })

    it("should accept definitions as pairs", () => {
      const schema = new SchemaGenerator().withRoot(z.object({ item: Item })).withDefinitions(new Map([["item", Item]])).generate()

      expect(Array.from(schema.definitions.keys())).toEqual(["item"])
      expect(schema.toJSON().properties).toEqual({ item: { $ref: "#/definitions/item" } })
    })

    it("should describe recursive types registered as definitions", () => {
      interface TreeNode {
        value: string
        children: TreeNode[]
      }
      const Tree: z.ZodType<TreeNode> = z.object({
        value: z.string().tag({ required: true }),
        children: z.array(z.lazy(() => Tree)),
      })

      const schema = new SchemaGenerator().withRoot(Tree).withDefinition("node", Tree).generate()

      expect(schema.toJSON()).toEqual({
        $schema: DEFAULT_SCHEMA,
        definitions: {
          node: {
            type: "object",
            properties: {
              value: { type: "string" },
              children: { type: "array", items: { $ref: "#/definitions/node" } },
            },
            required: ["value"],
          },
        },
        $ref: "#/definitions/node",
      })
    })
  })

  describe("documents", () => {
    it("should build an independent document on every call", () => {
      const generator = new SchemaGenerator().withRoot(Note)

      const first = generator.generate()
      const second = generator.generate()

      expect(first).not.toBe(second)
      expect(first.root).not.toBe(second.root)
      expect(first.toJSON()).toEqual(second.toJSON())
    })

    it("should not share extension values between documents", () => {
      const extensions = { enumNames: ["A", "B"] }
      const generator = new SchemaGenerator().withRoot(z.object({ f: z.string().tag({ enum: "a|b", extensions }) }))

      const first = generator.generate()
      const json = first.toJSON()
      const properties = json.properties
      if (!isRecord(properties) || !isRecord(properties.f) || !Array.isArray(properties.f.enumNames)) {
        throw new Error("unexpected document shape")
      }
      properties.f.enumNames.push("C")

      expect(extensions.enumNames).toEqual(["A", "B"])
      expect(first.toJSON().properties).toEqual({ f: { type: "string", enum: ["a", "b"], enumNames: ["A", "B"] } })
      expect(generator.generate().toJSON().properties).toEqual({ f: { type: "string", enum: ["a", "b"], enumNames: ["A", "B"] } })
    })

    it("should freeze documents", () => {
      const schema = generateJsonSchema(Note)

      expect(schema).toBeInstanceOf(JSONSchema)
      expect(Object.isFrozen(schema)).toBe(true)
    })

    it("should pick up definitions added after a previous generation", () => {
      const generator = new SchemaGenerator().withRoot(z.object({ item: Item }))

      expect(generator.generate().toJSON().properties).toEqual({
        item: { type: "object", properties: { foo: { type: "string" } }, required: ["foo"] },
      })
      expect(generator.withDefinition("item", Item).generate().toJSON().properties).toEqual({
        item: { $ref: "#/definitions/item" },
      })
    })
  })

  describe("errors", () => {
    const BadDefinition = z.object({ a: z.number().tag({ default: "x" }) })
    const BadRoot = z.object({ b: z.boolean().tag({ default: "maybe" }) })

    it("should report every failing target", () => {
      const result = new SchemaGenerator().withRoot(BadRoot).withDefinition("bad", BadDefinition).safeGenerate()

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error).toBeInstanceOf(GenerationError)
        expect(result.error.errors).toHaveLength(2)
        expect(result.error.errors[0]).toBeInstanceOf(DefinitionConversionError)
        expect(result.error.errors[0].target).toBe("bad")
        expect(result.error.errors[1]).toBeInstanceOf(RootConversionError)
        expect(result.error.errors[1].target).toBe("root")
        expect(result.error.message).toBe(
          'Schema generation failed: error on definition "bad": could not parse default "x" as number for property "a"; ' +
            'error on root: could not parse default "maybe" as boolean for property "b"',
        )
      }
    })

    it("should throw from generate()", () => {
      const generator = new SchemaGenerator().withRoot(BadRoot)

      expect(() => generator.generate()).toThrow(GenerationError)
      expect(() => generator.generate()).toThrow('Schema generation failed: error on root: could not parse default "maybe" as boolean for property "b"')
    })

    it("should keep the path of nested failures", () => {
      const schema = z.object({
        outer: z.object({
          inner: z.object({ count: z.number().tag({ default: "many" }) }),
        }),
      })

      const result = new SchemaGenerator().withRoot(schema).safeGenerate()

      expect(result.success).toBe(false)
      if (!result.success) {
        const [error] = result.error.errors
        expect(error.message).toBe('error on root: property "outer": property "inner": could not parse default "many" as number for property "count"')
        expect(error.cause).toBeInstanceOf(FieldConversionError)
        if (error.cause instanceof FieldConversionError) {
          expect(error.cause.path).toEqual(["outer", "inner"])
        }
      }
    })

    it("should reject invalid validators only when strict", () => {
      const schema = z.object({ name: z.string().tag({ minLength: "three", maxLength: 10 }) })

      expect(generateJsonSchema(schema).toJSON().properties).toEqual({ name: { type: "string", maxLength: 10 } })

      const result = new SchemaGenerator({ strict: true }).withRoot(schema).safeGenerate()
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.errors[0].cause).toBeInstanceOf(InvalidValidatorError)
      }
    })

    it("should report unregistered recursive types", () => {
      interface Chain {
        next?: Chain
      }
      const Link: z.ZodType<Chain> = z.object({ next: z.lazy(() => Link).optional() })

      const result = new SchemaGenerator().withRoot(Link).safeGenerate()

      expect(result.success).toBe(false)
      if (!result.success) {
        const [error] = result.error.errors
        expect(error).toBeInstanceOf(RootConversionError)

        let innermost: unknown = error
        while (innermost instanceof ConversionError) {
          innermost = innermost.cause
        }
        expect(innermost).toBeInstanceOf(RangeError)

        expect(error.message.startsWith('error on root: property "next": property "next": ')).toBe(true)
        expect(error.message.length).toBeLessThan(500)
      }
    })

    it("should succeed with safeGenerate() on valid input", () => {
      const result = new SchemaGenerator().withRoot(Note).safeGenerate()

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.data.toJSON().required).toEqual(["data"])
      }
    })
  })
})
