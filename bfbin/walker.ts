/**
 * Recursive-descent walk over tables, column headers and rows.
 *
 *   table  := TABLE_BASIC name basic | TABLE_KEYVAL name keyval
 *   basic  := (coltype name)* COL_NONE (ROW_DATA value*)* ROW_NONE
 *   keyval := (coltype name value)* COL_NONE
 */

import { ColumnType, RowType, TableType } from "./constants.ts";
import { DecodeError } from "./errors.ts";
import type { TableHandlers } from "./handlers.ts";
import { TEXT_DECODER, type ValueReader } from "./io.ts";

type ValueType = Exclude<ColumnType, typeof ColumnType.None>;

export class TableWalker<C> {
  private reader: ValueReader;
  private handlers: TableHandlers<C>;
  private ctx: C;

  constructor(reader: ValueReader, handlers: TableHandlers<C>, ctx: C) {
    this.reader = reader;
    this.handlers = handlers;
    this.ctx = ctx;
  }

  /**
   * Decode one table. Returns false once the stream terminator is read.
   */
  decodeTable(): boolean {
    const tagOffset = this.reader.position;
    const tableType = this.reader.readU8();
    if (tableType === TableType.None) return false;
    if (tableType !== TableType.Basic && tableType !== TableType.KeyValue) {
      throw this.unknownTag("table type", tableType, tagOffset);
    }
    const name = this.reader.readText();

    if (tableType === TableType.Basic) {
      this.handlers.tableBasic?.(this.ctx, name);
      this.decodeBasicBody();
    } else {
      this.handlers.tableKeyValue?.(this.ctx, name);
      this.decodeKeyValueBody();
    }
    this.handlers.tableEnd?.(this.ctx);
    return true;
  }

  private decodeBasicBody(): void {
    // Column list lives only as long as this table.
    const columns: ValueType[] = [];
    this.handlers.columnsBegin?.(this.ctx);
    while (true) {
      const type = this.readColumnType();
      if (type === ColumnType.None) break;
      this.declareColumn(type, this.reader.readText());
      columns.push(type);
    }
    this.handlers.columnsEnd?.(this.ctx);

    while (true) {
      const tagOffset = this.reader.position;
      const rowType = this.reader.readU8();
      if (rowType === RowType.None) break;
      if (rowType !== RowType.Data) throw this.unknownTag("row type", rowType, tagOffset);

      this.handlers.rowBegin?.(this.ctx);
      for (const type of columns) {
        this.readValue(type);
      }
      this.handlers.rowEnd?.(this.ctx);
    }
  }

  private decodeKeyValueBody(): void {
    while (true) {
      const type = this.readColumnType();
      if (type === ColumnType.None) break;
      this.declareColumn(type, this.reader.readText());
      this.readValue(type);
    }
  }

  private readColumnType(): ColumnType {
    const tagOffset = this.reader.position;
    const type = this.reader.readU8();
    switch (type) {
      case ColumnType.None:
      case ColumnType.Uint64:
      case ColumnType.String:
      case ColumnType.Bool:
        return type;
      default:
        throw this.unknownTag("column type", type, tagOffset);
    }
  }

  private declareColumn(type: ValueType, name: string): void {
    switch (type) {
      case ColumnType.Uint64:
        this.handlers.columnUint64?.(this.ctx, name);
        break;
      case ColumnType.String:
        this.handlers.columnString?.(this.ctx, name);
        break;
      case ColumnType.Bool:
        this.handlers.columnBool?.(this.ctx, name);
        break;
    }
  }

  private readValue(type: ValueType): void {
    switch (type) {
      case ColumnType.Uint64: {
        const value = this.reader.readU64();
        this.handlers.dataUint64?.(this.ctx, value);
        break;
      }
      case ColumnType.String: {
        const raw = this.reader.readString();
        this.handlers.dataString?.(this.ctx, TEXT_DECODER.decode(raw), raw);
        break;
      }
      case ColumnType.Bool: {
        const raw = this.reader.readBool();
        this.handlers.dataBool?.(this.ctx, raw !== 0, raw);
        break;
      }
    }
  }

  private unknownTag(what: string, tag: number, offset: number): DecodeError {
    return new DecodeError(
      "InternalInconsistency",
      `Unrecognized ${what} ${tag} in ${this.reader.source.name} at position ${offset}`,
      { offset },
    );
  }
}
