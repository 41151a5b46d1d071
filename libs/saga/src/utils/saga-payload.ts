import { JsonValue } from '@conductor/shared';

/**
 * Opaque step payload. Text covers JSON documents; bytes carry anything else.
 */
export type SagaPayload =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'bytes'; readonly bytes: Uint8Array };

/**
 * Serialized form used inside persisted documents
 */
export type SagaPayloadDocument =
  | { kind: 'text'; text: string }
  | { kind: 'bytes'; base64: string };

export const SagaPayloads = {
  text(text: string): SagaPayload {
    return { kind: 'text', text };
  },

  json(value: JsonValue): SagaPayload {
    return { kind: 'text', text: JSON.stringify(value) };
  },

  bytes(bytes: Uint8Array): SagaPayload {
    return { kind: 'bytes', bytes: Uint8Array.from(bytes) };
  },

  /**
   * Wrap a loose value: strings stay text, byte arrays stay bytes, the rest is JSON encoded
   */
  from(value: JsonValue | Uint8Array): SagaPayload {
    if (value instanceof Uint8Array) {
      return SagaPayloads.bytes(value);
    }
    if (typeof value === 'string') {
      return SagaPayloads.text(value);
    }
    return SagaPayloads.json(value);
  },

  readText(payload: SagaPayload): string {
    return payload.kind === 'text' ? payload.text : Buffer.from(payload.bytes).toString('utf8');
  },

  readJson(payload: SagaPayload): JsonValue {
    const parsed: JsonValue = JSON.parse(SagaPayloads.readText(payload));
    return parsed;
  },

  toDocument(payload: SagaPayload): SagaPayloadDocument {
    return payload.kind === 'text'
      ? { kind: 'text', text: payload.text }
      : { kind: 'bytes', base64: Buffer.from(payload.bytes).toString('base64') };
  },

  fromDocument(document: SagaPayloadDocument): SagaPayload {
    return document.kind === 'text'
      ? { kind: 'text', text: document.text }
      : { kind: 'bytes', bytes: new Uint8Array(Buffer.from(document.base64, 'base64')) };
  },
};
