import { getErrorMessage, SerializationError } from './errors.js';

export interface Header {
  readonly name: string;
  readonly value: string;
}

export type ResponseBody =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'bytes'; readonly bytes: Uint8Array }
  | { readonly kind: 'json'; readonly value: unknown };

/**
 * What a handler hands back. `status` 0 or absent means 200. `error` is an
 * application-level failure: it is logged but does not change the status.
 */
export interface HandlerResponse {
  readonly body?: ResponseBody | undefined;
  readonly status?: number | undefined;
  readonly headers?: readonly Header[] | undefined;
  readonly error?: unknown;
}

export function textBody(text: string): ResponseBody {
  return { kind: 'text', text };
}

export function bytesBody(bytes: Uint8Array): ResponseBody {
  return { kind: 'bytes', bytes };
}

export function jsonBody(value: unknown): ResponseBody {
  return { kind: 'json', value };
}

export function header(name: string, value: string): Header {
  return { name, value };
}

export type JsonSerializer = (value: unknown, indented: boolean) => Buffer;

export const serializeJson: JsonSerializer = (value, indented) => {
  let text: string | undefined;
  try {
    text = JSON.stringify(value, null, indented ? 2 : undefined);
  } catch (error) {
    throw new SerializationError(getErrorMessage(error), { cause: error });
  }
  if (text === undefined) {
    throw new SerializationError(
      `value of type ${typeof value} has no JSON representation`
    );
  }
  return Buffer.from(text, 'utf8');
};
