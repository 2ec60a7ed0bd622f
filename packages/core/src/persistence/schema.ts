/**
 * Zod schemas for persisted history state.
 */

import { z } from "zod";

export const ContentPartSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("image"),
    url: z.string(),
    detail: z.enum(["auto", "low", "high"]).optional(),
  }),
]);

export const MessageContentSchema = z.union([z.string(), z.array(ContentPartSchema)]);

export const ToolInvocationSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
});

export const HistoryMessageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: MessageContentSchema }),
  z.object({ role: z.literal("human"), content: MessageContentSchema }),
  z.object({
    role: z.literal("ai"),
    content: MessageContentSchema,
    toolCalls: z.array(ToolInvocationSchema).optional(),
  }),
  z.object({
    role: z.literal("tool-result"),
    content: MessageContentSchema,
    toolCallId: z.string(),
  }),
]);

export const SerializedMetadataSchema = z.object({
  tokens: z.number().int().nonnegative(),
  message_type: z.string().nullable().optional(),
});

export const SerializedEntrySchema = z.object({
  message: z.unknown(),
  metadata: SerializedMetadataSchema,
});

export const SerializedLedgerSchema = z.object({
  messages: z.array(SerializedEntrySchema),
  current_tokens: z.number().int().nonnegative(),
});

export type SerializedEntry = z.infer<typeof SerializedEntrySchema>;
export type SerializedLedger = z.infer<typeof SerializedLedgerSchema>;
