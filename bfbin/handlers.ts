/**
 * Event contract between the decoder and its caller.
 *
 * Every callback is optional; absent ones are skipped. Callbacks run
 * synchronously in stream order and receive the caller's context as their
 * first argument. `raw` byte views alias the decoder's scratch buffer and are
 * only valid until the callback returns.
 */

import { HANDLER_SET_REVISION } from "./constants.ts";
import { DecodeError } from "./errors.ts";

export interface TableHandlers<C> {
  /** Must equal HANDLER_SET_REVISION */
  readonly revision: number;

  tableBasic?(ctx: C, name: string): void;
  tableKeyValue?(ctx: C, name: string): void;
  tableEnd?(ctx: C): void;

  columnUint64?(ctx: C, name: string): void;
  columnString?(ctx: C, name: string): void;
  columnBool?(ctx: C, name: string): void;
  /** Fired once per basic table, before the first column declaration */
  columnsBegin?(ctx: C): void;
  /** Fired once per basic table, after the last column declaration */
  columnsEnd?(ctx: C): void;

  rowBegin?(ctx: C): void;
  rowEnd?(ctx: C): void;

  dataUint64?(ctx: C, value: bigint): void;
  dataString?(ctx: C, value: string, raw: Uint8Array): void;
  dataBool?(ctx: C, value: boolean, raw: number): void;

  /** At most once per decode call */
  error?(ctx: C, message: string, error: DecodeError): void;
}

export const HANDLER_NAMES = [
  "tableBasic",
  "tableKeyValue",
  "tableEnd",
  "columnUint64",
  "columnString",
  "columnBool",
  "columnsBegin",
  "columnsEnd",
  "rowBegin",
  "rowEnd",
  "dataUint64",
  "dataString",
  "dataBool",
  "error",
] as const satisfies readonly (keyof TableHandlers<unknown>)[];

/**
 * Structural check that a handler set was built for this event contract.
 * Other members (a caller's own state) are ignored. Returns null when it
 * matches.
 */
export function validateHandlers<C>(handlers: TableHandlers<C>): DecodeError | null {
  if (handlers.revision !== HANDLER_SET_REVISION) {
    return new DecodeError(
      "HandlerSetMismatch",
      `Mismatched handler set: revision ${String(handlers.revision)}, decoder expects ${HANDLER_SET_REVISION}`,
    );
  }
  for (const name of HANDLER_NAMES) {
    const handler = handlers[name];
    if (handler !== undefined && typeof handler !== "function") {
      return new DecodeError("HandlerSetMismatch", `Mismatched handler set: "${name}" is not a function`);
    }
  }
  return null;
}
