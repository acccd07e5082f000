// packages/core/src/messages/types.ts
import type { TargetVariant } from '../config/defaults.js';

/** Opaque 32-bit unsigned type identifier supplied by the type catalog. */
export type Oid = number;

/** 0 = text, 1 = binary; any int16 is passed through unchanged. */
export type FormatCode = number;

/* ---------------------------------------------------------------------
   Extended-query messages
--------------------------------------------------------------------- */
export interface BindMessage {
  readonly type         : 'bind';
  readonly portal       : string;
  readonly statement    : string;
  readonly formats      : readonly FormatCode[];
  /** Pre-encoded parameter bytes; `null` is SQL NULL */
  readonly values       : readonly (Uint8Array | null)[];
  readonly resultFormats: readonly FormatCode[];
}

export interface CloseMessage {
  readonly type   : 'close';
  readonly variant: TargetVariant;
  readonly name   : string;
}

export interface DescribeMessage {
  readonly type   : 'describe';
  readonly variant: TargetVariant;
  readonly name   : string;
}

export interface ExecuteMessage {
  readonly type   : 'execute';
  readonly portal : string;
  /** 0 = no limit */
  readonly maxRows: number;
}

export interface ParseMessage {
  readonly type      : 'parse';
  readonly name      : string;
  readonly query     : string;
  readonly paramTypes: readonly Oid[];
}

export interface SyncMessage  { readonly type: 'sync'; }
export interface FlushMessage { readonly type: 'flush'; }

/* ---------------------------------------------------------------------
   COPY sub-protocol
--------------------------------------------------------------------- */
export interface CopyDataMessage {
  readonly type: 'copyData';
  readonly data: Uint8Array;
}

export interface CopyDoneMessage { readonly type: 'copyDone'; }

export interface CopyFailMessage {
  readonly type   : 'copyFail';
  readonly message: string;
}

/* ---------------------------------------------------------------------
   Simple query & session control
--------------------------------------------------------------------- */
export interface QueryMessage {
  readonly type: 'query';
  readonly sql : string;
}

export interface TerminateMessage { readonly type: 'terminate'; }

export interface CancelRequestMessage {
  readonly type     : 'cancelRequest';
  readonly processId: number;
  readonly secretKey: number;
}

export type FrontendMessage =
  | BindMessage
  | CancelRequestMessage
  | CloseMessage
  | CopyDataMessage
  | CopyDoneMessage
  | CopyFailMessage
  | DescribeMessage
  | ExecuteMessage
  | FlushMessage
  | ParseMessage
  | QueryMessage
  | SyncMessage
  | TerminateMessage;
