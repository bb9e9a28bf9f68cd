export {
  decodeFile,
  decodeBytes,
  decodeSource,
  type DecoderOptions,
  type TableHandlers,
  validateHandlers,
  HANDLER_NAMES,
  HANDLER_SET_REVISION,
  DecodeError,
  type DecodeErrorKind,
  MAGIC,
  TableType,
  ColumnType,
  RowType,
  READ_BUFFER_SIZE,
  MAX_STRING_LENGTH,
  ScratchBuffer,
  ValueReader,
  type UintWidth,
  type ByteSource,
  BufferSource,
  FileSource,
  type FileSourceOptions,
  TableWalker,
} from "./bfbin/index.ts";
