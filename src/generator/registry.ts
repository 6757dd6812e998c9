import { z, getSourceSchema } from "@/schema"
import { unwrapSchema } from "@/utils"

/**
 * Entry stored in the registry
 */
export interface DefinitionEntry {
  name: string
  schema: z.ZodType
}

/**
 * Read-only view of the registry used while building schemas
 */
export interface DefinitionLookup {
  lookup(schema: z.ZodType): string | undefined
  reference(schema: z.ZodType): string | undefined
}

/**
 * Resolve the identity of a type: wrappers are removed and clones made by
 * `.tag()` resolve to the schema they were tagged from.
 */
export function typeIdentity(schema: z.ZodType): z.ZodType {
  const unwrapped = unwrapSchema(schema)
  return getSourceSchema(unwrapped) ?? unwrapped
}

/**
 * Maps type identities to definition names.
 * Filled once before generation, then sealed.
 */
export class DefinitionRegistry implements DefinitionLookup {
  private _definitions: Map<z.ZodType, DefinitionEntry> = new Map()
  private _sealed = false

  /**
   * Register a schema under a definition name
   * @param name - The definition name, emitted under `definitions`
   * @param schema - The schema; nullable/optional wrappers are removed
   * @returns this for method chaining
   */
  register(name: string, schema: z.ZodType): this {
    if (this._sealed) {
      throw new Error(`Definition registry is sealed, cannot register "${name}"`)
    }
    if (!name) {
      throw new Error("Definition name must not be empty")
    }

    const identity = typeIdentity(schema)
    const existing = this._definitions.get(identity)
    if (existing && existing.name !== name) {
      console.warn(`[jsonschema] Type registered as "${existing.name}" is registered again as "${name}", keeping "${name}"`)
    }

    this._definitions.set(identity, { name, schema: unwrapSchema(schema) })
    return this
  }

  /**
   * Get the definition name of a type
   * @param schema - The schema instance
   * @returns The name or undefined if the type is not registered
   */
  lookup(schema: z.ZodType): string | undefined {
    return this._definitions.get(typeIdentity(schema))?.name
  }

  /**
   * Get a `$ref` pointer to the definition of a type
   * @param schema - The schema instance
   * @returns `#/definitions/<name>` or undefined if the type is not registered
   */
  reference(schema: z.ZodType): string | undefined {
    const name = this.lookup(schema)
    return name === undefined ? undefined : `#/definitions/${name}`
  }

  /**
   * Forbid further registrations
   */
  seal(): this {
    this._sealed = true
    return this
  }

  get sealed(): boolean {
    return this._sealed
  }

  /**
   * Get all entries in registration order
   */
  values(): IterableIterator<DefinitionEntry> {
    return this._definitions.values()
  }

  /**
   * Get the number of registered types
   */
  get size(): number {
    return this._definitions.size
  }
}
