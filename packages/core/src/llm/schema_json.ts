/**
 * AJV JSON Schema for the model's JSON answer.
 */

export const translationPayloadSchema = {
  type: 'object' as const,
  properties: {
    sql: { type: 'string' as const, minLength: 1 },
    notes: { type: 'string' as const },
  },
  required: ['sql'] as const,
  additionalProperties: false,
};
