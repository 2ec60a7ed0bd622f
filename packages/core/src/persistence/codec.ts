/**
 * MessageCodec: the serialization contract for a single message.
 *
 * The ledger's persisted layout only ever holds what `encode` returns,
 * so a different message representation can be plugged in without
 * changing the layout around it.
 */

import type { HistoryMessage } from "@tallyline/sdk";
import { MalformedStateError } from "@tallyline/sdk";
import { formatZodError } from "@tallyline/shared";
import { HistoryMessageSchema } from "./schema.js";

export interface MessageCodec<Encoded = unknown> {
  encode(message: HistoryMessage): Encoded;
  /** Throws MalformedStateError when `raw` is not a message. */
  decode(raw: unknown): HistoryMessage;
}

/** Plain JSON objects, checked against the message schema on decode. */
export const jsonMessageCodec: MessageCodec<HistoryMessage> = {
  encode(message: HistoryMessage): HistoryMessage {
    return structuredClone(message);
  },

  decode(raw: unknown): HistoryMessage {
    const result = HistoryMessageSchema.safeParse(raw);
    if (!result.success) {
      throw new MalformedStateError(`invalid message: ${formatZodError(result.error)}`);
    }
    return result.data;
  },
};
