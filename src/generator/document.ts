import { clean, cloneRecord } from "@/utils"
import type { JsonSchemaObject, SchemaNode } from "@/generator/types"

/**
 * The draft URI emitted as `$schema` unless configured otherwise
 */
export const DEFAULT_SCHEMA = "http://json-schema.org/schema#"

function serializeMap(map: Map<string, SchemaNode> | undefined): JsonSchemaObject | undefined {
  if (!map) return undefined
  return Object.fromEntries(Array.from(map, ([key, child]) => [key, serializeNode(child)]))
}

/**
 * Convert a node to its JSON form. Empty keys are left out and extensions are
 * merged last, so they replace generated keywords of the same name.
 */
export function serializeNode(node: SchemaNode): JsonSchemaObject {
  const json = clean([
    ["type", node.type],
    ["format", node.format],
    ["items", node.items && serializeNode(node.items)],
    ["properties", serializeMap(node.properties)],
    ["required", node.required],
    ["additionalProperties", node.additionalProperties || undefined],
    ["description", node.description],
    ["anyOf", node.anyOf?.map(serializeNode)],
    ["oneOf", node.oneOf?.map(serializeNode)],
    ["dependencies", serializeMap(node.dependencies)],
    ["default", node.default],
    ["multipleOf", node.multipleOf],
    ["maximum", node.maximum],
    ["minimum", node.minimum],
    ["exclusiveMaximum", node.exclusiveMaximum],
    ["exclusiveMinimum", node.exclusiveMinimum],
    ["maxLength", node.maxLength],
    ["minLength", node.minLength],
    ["pattern", node.pattern],
    ["enum", node.enum],
    ["title", node.title],
    ["const", node.const],
    ["$ref", node.ref],
  ])

  return node.extensions ? { ...json, ...cloneRecord(node.extensions) } : json
}

/**
 * A generated JSON Schema document: the root schema, the named definitions and
 * the dialect URI. Built once per generation and never modified.
 */
export class JSONSchema {
  readonly definitions: ReadonlyMap<string, SchemaNode>

  constructor(
    readonly schema: string,
    definitions: Map<string, SchemaNode>,
    readonly root: SchemaNode | undefined,
  ) {
    this.definitions = definitions
    Object.freeze(this)
  }

  /**
   * Convert the document to its JSON form, with the root schema's keywords
   * at the top level next to `$schema` and `definitions`
   */
  toJSON(): JsonSchemaObject {
    return {
      ...clean([
        ["$schema", this.schema],
        ["definitions", Object.fromEntries(Array.from(this.definitions, ([name, node]) => [name, serializeNode(node)]))],
      ]),
      ...(this.root ? serializeNode(this.root) : {}),
    }
  }

  /**
   * Render the document as JSON text with a 2-space indent
   */
  toString(): string {
    return JSON.stringify(this.toJSON(), null, 2)
  }
}
