/**
 * Constants for the binary table stream format.
 */

/** "BYFLBIN" - the 7-byte marker every stream starts with. */
export const MAGIC = new Uint8Array([0x42, 0x59, 0x46, 0x4c, 0x42, 0x49, 0x4e]);

export const TableType = {
  None: 0,
  Basic: 1,
  KeyValue: 2,
} as const;
export type TableType = (typeof TableType)[keyof typeof TableType];

export const ColumnType = {
  None: 0,
  Uint64: 1,
  String: 2,
  Bool: 3,
} as const;
export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

export const RowType = {
  None: 0,
  Data: 1,
} as const;
export type RowType = (typeof RowType)[keyof typeof RowType];

/** Default chunk size for buffered file reads (10MB) */
export const READ_BUFFER_SIZE = 10 * 1024 * 1024;

/** Strings are prefixed with a u16 length */
export const MAX_STRING_LENGTH = 0xffff;

/**
 * Event-contract revision. Bump whenever a handler is added, removed or
 * changes signature so stale handler sets are refused.
 */
export const HANDLER_SET_REVISION = 2;
