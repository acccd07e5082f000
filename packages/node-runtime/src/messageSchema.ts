// packages/node-runtime/src/messageSchema.ts
import { z } from 'zod';
import {
  MessageFormatError,
  TargetVariant,
  hexDecode,
  type FrontendMessage,
} from '../../core/src/index.js';

const utf8 = new TextEncoder();

/** Byte fields take a UTF-8 string, `{ "hex": "…" }` or `{ "base64": "…" }`. */
const BytesSchema = z.union([
  z.string().transform(s => utf8.encode(s)),
  z.object({ hex: z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'hex must be an even run of hex digits') })
    .transform(o => hexDecode(o.hex)),
  z.object({ base64: z.string().regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'invalid base64') })
    .transform(o => new Uint8Array(Buffer.from(o.base64, 'base64'))),
]);

const VariantSchema = z.enum(['portal', 'statement'])
  .transform((v): TargetVariant => (v === 'portal' ? TargetVariant.Portal : TargetVariant.Statement));

const Int = z.number().int();

/** JSON shape of one frontend message, as accepted on the command line. */
export const MessageSchema = z.discriminatedUnion('type', [
  z.object({
    type         : z.literal('bind'),
    portal       : z.string().default(''),
    statement    : z.string().default(''),
    formats      : z.array(Int).default([]),
    values       : z.array(BytesSchema.nullable()).default([]),
    resultFormats: z.array(Int).default([]),
  }),
  z.object({
    type     : z.literal('cancelRequest'),
    processId: Int,
    secretKey: Int,
  }),
  z.object({ type: z.literal('close'),    variant: VariantSchema, name: z.string().default('') }),
  z.object({ type: z.literal('copyData'), data: BytesSchema }),
  z.object({ type: z.literal('copyDone') }),
  z.object({ type: z.literal('copyFail'), message: z.string() }),
  z.object({ type: z.literal('describe'), variant: VariantSchema, name: z.string().default('') }),
  z.object({ type: z.literal('execute'),  portal: z.string().default(''), maxRows: Int.default(0) }),
  z.object({ type: z.literal('flush') }),
  z.object({
    type      : z.literal('parse'),
    name      : z.string().default(''),
    query     : z.string(),
    paramTypes: z.array(Int).default([]),
  }),
  z.object({ type: z.literal('query'),     sql: z.string() }),
  z.object({ type: z.literal('sync') }),
  z.object({ type: z.literal('terminate') }),
]);

const MessageListSchema = z.union([MessageSchema.transform(m => [m]), z.array(MessageSchema)]);

/**
 * Parses and validates a JSON message description (one object or an array).
 *
 * @throws {MessageFormatError} If the text is not JSON or does not describe
 *   frontend messages
 */
export function parseMessages(raw: string): FrontendMessage[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MessageFormatError(
      `Failed to parse message as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }

  const result = MessageListSchema.safeParse(json);
  if (!result.success) {
    const errorMessages = result.error.issues
      .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join(', ');
    throw new MessageFormatError(`Validation failed: ${errorMessages}`);
  }

  return result.data;
}
