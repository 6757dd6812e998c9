/**
 * Schema module - re-exports Zod with the `.tag()` extension
 *
 * - `.tag({...})` - Attach field annotations (name, required, validators, default, extensions)
 * - `bytes()` - A byte sequence schema, described as a string
 *
 * @example
 * ```ts
 * import { z } from 'zod-struct-schema'
 *
 * const Fruit = z.object({
 *   name: z.string().tag({ required: true, minLength: 3 }),
 *   kind: z.string().tag({ enum: 'apple|banana|pear' }),
 * })
 * ```
 */

// Import meta.ts to apply the prototype extension and re-export z
export { z } from "@/schema/meta"

export * from "@/schema/meta"
