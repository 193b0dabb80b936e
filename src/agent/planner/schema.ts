import { z } from "zod";

export const rawPlanPayloadSchema = z.object({
  plan: z.array(z.unknown()),
});

export type RawPlanPayload = z.infer<typeof rawPlanPayloadSchema>;

export const rawStepEnvelopeSchema = z.looseObject({
  type: z.string(),
});

const inputValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const rawToolStepSchema = z.looseObject({
  inputs: z.record(z.string(), z.unknown()).optional(),
  name: z.string().optional(),
  rationale: z.string().optional(),
  tool: z.string().optional(),
  type: z.literal("tool"),
});

export const rawInfoStepSchema = z.looseObject({
  message: z.string().optional(),
  text: z.string().optional(),
  type: z.literal("info"),
});

export function normalizeInputValue(value: unknown): string | undefined {
  const parsed = inputValueSchema.safeParse(value);
  if (!parsed.success) {
    return undefined;
  }

  return typeof parsed.data === "string" ? parsed.data : String(parsed.data);
}

export const PLAN_PAYLOAD_JSON_SCHEMA: Record<string, unknown> = {
  $schema: "http://json-schema.org/draft-07/schema#",
  additionalProperties: false,
  properties: {
    plan: {
      items: {
        oneOf: [
          {
            additionalProperties: false,
            properties: {
              inputs: {
                additionalProperties: {
                  type: "string",
                },
                type: "object",
              },
              rationale: {
                type: "string",
              },
              tool: {
                minLength: 1,
                type: "string",
              },
              type: {
                const: "tool",
                type: "string",
              },
            },
            required: ["type", "tool", "inputs"],
            type: "object",
          },
          {
            additionalProperties: false,
            properties: {
              text: {
                minLength: 1,
                type: "string",
              },
              type: {
                const: "info",
                type: "string",
              },
            },
            required: ["type", "text"],
            type: "object",
          },
        ],
      },
      type: "array",
    },
  },
  required: ["plan"],
  type: "object",
};
