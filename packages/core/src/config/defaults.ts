/* ------------------------------------------------------------------ */
/*  Wire constants (protocol v3)                                       */
/* ------------------------------------------------------------------ */
export const UINT16_MAX = 0xFFFF;
export const INT16_MIN  = -0x8000;
export const INT16_MAX  = 0x7FFF;
export const INT32_MIN  = -0x80000000;
export const INT32_MAX  = 0x7FFFFFFF;
export const UINT32_MAX = 0xFFFFFFFF;

/** First int32 of a CancelRequest body: 1234 in the high half, 5678 in the low. */
export const CANCEL_REQUEST_CODE = 80877102;

/** Length written for a NULL parameter value in Bind. */
export const NULL_LENGTH = -1;

/** Tag byte per message kind; `null` means the message is sent untagged. */
export const MESSAGE_TAGS = {
  bind         : 0x42, // B
  cancelRequest: null,
  close        : 0x43, // C
  copyData     : 0x64, // d
  copyDone     : 0x63, // c
  copyFail     : 0x66, // f
  describe     : 0x44, // D
  execute      : 0x45, // E
  flush        : 0x48, // H
  parse        : 0x50, // P
  query        : 0x51, // Q
  sync         : 0x53, // S
  terminate    : 0x58, // X
} as const;

export type MessageKind = keyof typeof MESSAGE_TAGS;

/** Selector byte of Close / Describe. */
export const TargetVariant = {
  Portal   : 0x50, // P
  Statement: 0x53, // S
} as const;

export type TargetVariant = (typeof TargetVariant)[keyof typeof TargetVariant];

/* ------------------------------------------------------------------ */
/*  Runtime defaults                                                   */
/* ------------------------------------------------------------------ */
export const DEFAULT_OPTIONS = {
  initialCapacity: 256,
  verbose        : 0,
} as const;
