// Types
export type { BuildOptions, DefaultValue, GeneratorOptions, JSONType, JsonSchemaObject, SchemaNode } from "@/generator/types"

// Registry
export { DefinitionRegistry, typeIdentity, type DefinitionEntry, type DefinitionLookup } from "@/generator/registry"

// Annotation extraction
export { applyAnnotation, collectTags, isRequiredField, readFieldAnnotation, type FieldAnnotation } from "@/generator/tags"

// Type walker
export { SchemaBuilder, isPrimitiveKind, kindOf, typeFromMapping, type TypeKind } from "@/generator/builder"

// Document assembly
export { DEFAULT_SCHEMA, JSONSchema, serializeNode } from "@/generator/document"
export { SchemaGenerator, generateJsonSchema, type GenerateResult } from "@/generator/generator"
