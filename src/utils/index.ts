import { z } from "@/schema"

export { clean, cloneRecord, isEmpty } from "@/utils/clean"
export { parseBooleanLiteral, parseFloatLiteral, parseIntegerLiteral } from "@/utils/literals"

/**
 * Unwrap optional/nullable/default wrappers to get to the inner schema
 */
export const unwrapSchema = (schema: z.ZodType): z.ZodType => {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = schema.unwrap()
    return inner instanceof z.ZodType ? unwrapSchema(inner) : schema
  }
  if (schema instanceof z.ZodDefault) {
    const inner = schema.removeDefault()
    return inner instanceof z.ZodType ? unwrapSchema(inner) : schema
  }
  return schema
}
