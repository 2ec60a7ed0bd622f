export { serializeLedger, deserializeLedger } from "./serializer.js";
export type { DeserializeOptions } from "./serializer.js";
export { jsonMessageCodec } from "./codec.js";
export type { MessageCodec } from "./codec.js";
export {
  HistoryMessageSchema,
  SerializedLedgerSchema,
  SerializedEntrySchema,
} from "./schema.js";
export type { SerializedLedger, SerializedEntry } from "./schema.js";
