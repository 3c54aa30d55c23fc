export const fileContentOutputSchema = {
  type: "object",
  additionalProperties: false,
  required: ["content"],
  properties: {
    content: { type: "string" },
    summary: { type: "string" }
  }
} as const;
