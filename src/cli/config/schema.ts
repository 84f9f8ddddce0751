/**
 * JSON schema for configuration files, checked with Ajv
 */

export const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    inference: {
      type: "object",
      additionalProperties: false,
      properties: {
        exampleCap: { type: "integer", minimum: 0 },
        abstractDateKeys: { type: "boolean" },
        minKeyGroupSize: { type: "integer", minimum: 1 },
        placeholderTemplate: { type: "string", minLength: 1 },
        maxArrayItems: { type: "integer", minimum: 1 },
      },
    },
    output: {
      type: "object",
      additionalProperties: false,
      properties: {
        format: { enum: ["json", "tree"] },
        indent: { type: "integer", minimum: 0, maximum: 10 },
      },
    },
    types: {
      type: "object",
      additionalProperties: false,
      properties: {
        rootName: { type: "string", pattern: "^[A-Za-z_$][A-Za-z0-9_$]*$" },
      },
    },
  },
} as const;
