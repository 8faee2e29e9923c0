import { z } from "zod";
import { FunctionDeclarationSchema, Schema, SchemaType } from "@google/generative-ai";

/**
 * Converts a tool's zod schema to JSON Schema for OpenAI-style and Claude
 * tool definitions. Covers the shapes tool arguments actually use.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const description = schema.description;
  const withDescription = (result: Record<string, unknown>) =>
    description ? { ...result, description } : result;

  if (schema instanceof z.ZodObject) {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];
    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) required.push(key);
    }
    return withDescription({
      type: "object",
      properties,
      ...(required.length > 0 && { required })
    });
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToJsonSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return zodToJsonSchema(schema.removeDefault());
  }
  if (schema instanceof z.ZodString) return withDescription({ type: "string" });
  if (schema instanceof z.ZodNumber) {
    return withDescription({ type: schema.isInt ? "integer" : "number" });
  }
  if (schema instanceof z.ZodBoolean) return withDescription({ type: "boolean" });
  if (schema instanceof z.ZodArray) {
    return withDescription({ type: "array", items: zodToJsonSchema(schema.element) });
  }
  if (schema instanceof z.ZodEnum) {
    return withDescription({ type: "string", enum: [...schema.options] });
  }
  return withDescription({});
}

export function toGeminiParameters(schema: z.AnyZodObject): FunctionDeclarationSchema {
  const properties: Record<string, Schema> = {};
  const required: string[] = [];
  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = toGeminiProperty(value);
    if (!value.isOptional()) required.push(key);
  }
  return { type: SchemaType.OBJECT, properties, required };
}

function toGeminiProperty(schema: z.ZodTypeAny): Schema {
  const description = schema.description;
  let inner = schema;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable || inner instanceof z.ZodDefault) {
    inner = inner instanceof z.ZodDefault ? inner.removeDefault() : inner.unwrap();
  }
  const text = description ?? inner.description;

  if (inner instanceof z.ZodNumber) {
    return inner.isInt
      ? { type: SchemaType.INTEGER, description: text }
      : { type: SchemaType.NUMBER, description: text };
  }
  if (inner instanceof z.ZodBoolean) return { type: SchemaType.BOOLEAN, description: text };
  return { type: SchemaType.STRING, description: text };
}
