/**
 * Ledger persistence.
 *
 * Layout: `{ messages: [{ message, metadata: { tokens, message_type } }], current_tokens }`.
 * Loading re-checks `current_tokens` against the restored entries and
 * rejects the input on any mismatch.
 */

import type { IMessageLedger, LedgerEntry } from "@tallyline/sdk";
import { MalformedStateError } from "@tallyline/sdk";
import { formatZodError } from "@tallyline/shared";
import { createMessageLedger } from "../ledger/index.js";
import type { MessageLedgerOptions } from "../ledger/index.js";
import { jsonMessageCodec } from "./codec.js";
import type { MessageCodec } from "./codec.js";
import { SerializedLedgerSchema } from "./schema.js";
import type { SerializedLedger } from "./schema.js";

export function serializeLedger(
  ledger: IMessageLedger,
  codec: MessageCodec = jsonMessageCodec,
): SerializedLedger {
  return {
    messages: ledger.entries().map((e) => ({
      message: codec.encode(e.message),
      metadata: {
        tokens: e.metadata.tokens,
        message_type: e.metadata.messageType ?? null,
      },
    })),
    current_tokens: ledger.totalTokens(),
  };
}

export interface DeserializeOptions extends Omit<MessageLedgerOptions, "entries"> {
  codec?: MessageCodec;
}

export function deserializeLedger(
  input: unknown,
  options: DeserializeOptions = {},
): IMessageLedger {
  const { codec = jsonMessageCodec, ...ledgerOptions } = options;

  const parsed = SerializedLedgerSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedStateError(formatZodError(parsed.error));
  }

  const entries: LedgerEntry[] = parsed.data.messages.map((raw) => {
    const { tokens, message_type } = raw.metadata;
    return {
      message: codec.decode(raw.message),
      metadata: message_type == null ? { tokens } : { tokens, messageType: message_type },
    };
  });

  const sum = entries.reduce((acc, e) => acc + e.metadata.tokens, 0);
  if (sum !== parsed.data.current_tokens) {
    throw new MalformedStateError(
      `current_tokens is ${parsed.data.current_tokens} but entries sum to ${sum}`,
    );
  }

  return createMessageLedger({ ...ledgerOptions, entries });
}
