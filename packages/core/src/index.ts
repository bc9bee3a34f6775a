export * from "./binary/bit-extract";
export * from "./decoder/message-decoder";
export type * from "./decoder/types";
export * from "./definition/lookup";
export type * from "./definition/provider";
export * from "./format/json";
export * from "./frame";
export * from "./identifier";
export * from "./notices";
export * from "./source-address";
export * from "./units";
