/**
 * Binary table stream decoder.
 *
 * Usage:
 *   import { decodeFile, HANDLER_SET_REVISION } from "./bfbin/index.ts";
 *
 *   const names: string[] = [];
 *   decodeFile("run.bfbin", {
 *     revision: HANDLER_SET_REVISION,
 *     tableBasic: (ctx, name) => ctx.push(name),
 *     error: (_ctx, message) => console.error(message),
 *   }, names);
 */

export {
  MAGIC,
  TableType,
  ColumnType,
  RowType,
  READ_BUFFER_SIZE,
  MAX_STRING_LENGTH,
  HANDLER_SET_REVISION,
} from "./constants.ts";
export { DecodeError, type DecodeErrorKind } from "./errors.ts";
export { type TableHandlers, HANDLER_NAMES, validateHandlers } from "./handlers.ts";
export { ScratchBuffer, ValueReader, type UintWidth } from "./io.ts";
export { type ByteSource, BufferSource, FileSource, type FileSourceOptions } from "./source.ts";
export { TableWalker } from "./walker.ts";
export { decodeFile, decodeBytes, decodeSource, type DecoderOptions } from "./session.ts";
