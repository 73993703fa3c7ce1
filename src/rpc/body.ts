import { Buffer } from "node:buffer";

import { ParseError } from "./errors.js";
import { parseJson } from "./json.js";

/** Raw request body as handed over by a transport. */
export type RawBody = Uint8Array | string;

/** One element of a batch body, decoded on its own. */
export type BatchSlot =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly text: string };

export type ParsedBody =
  | { readonly kind: "single"; readonly value: unknown }
  | { readonly kind: "batch"; readonly slots: readonly BatchSlot[] };

const JSON_WHITESPACE = new Set([" ", "\t", "\n", "\r"]);
const TRAILING_WHITESPACE = /^[ \t\n\r]*$/;

/** Decodes {@link body} as UTF-8 and drops a leading byte order mark. */
export function decodeBody(body: RawBody): string {
  const text =
    typeof body === "string" ? body : Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString("utf8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function firstSignificantIndex(text: string): number {
  for (let index = 0; index < text.length; index += 1) {
    if (!JSON_WHITESPACE.has(text[index])) {
      return index;
    }
  }
  return -1;
}

/**
 * Reads a raw body. A body whose first significant character is `[` is a
 * batch: its elements are split apart and decoded one by one so a malformed
 * element only spoils itself. Anything else must be a single JSON document.
 *
 * @throws ParseError when the body is not JSON, or when a batch array is never
 * closed or is followed by anything but whitespace.
 */
export function readRawBody(body: RawBody): ParsedBody {
  const text = decodeBody(body);
  const start = firstSignificantIndex(text);

  if (start === -1 || text[start] !== "[") {
    try {
      return { kind: "single", value: parseJson(text) };
    } catch {
      throw new ParseError();
    }
  }

  const elements = splitBatchElements(text, start);
  if (elements === null) {
    throw new ParseError();
  }
  return { kind: "batch", slots: elements.map(decodeSlot) };
}

function decodeSlot(text: string): BatchSlot {
  try {
    return { ok: true, value: parseJson(text) };
  } catch {
    return { ok: false, text };
  }
}

/**
 * Splits the array opened at {@link start} into the source text of its
 * elements. Brackets are tracked per kind and strings are skipped; a closer
 * that does not match the innermost opener unwinds to its own opener, and a
 * stray `]` at element depth closes the array. Returns `null` when the array
 * is unterminated or trailed by something other than whitespace.
 */
export function splitBatchElements(text: string, start: number): string[] | null {
  const elements: string[] = [];
  const openers: string[] = [];
  let elementStart = start + 1;
  let inString = false;
  let escaped = false;

  for (let index = start + 1; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    switch (char) {
      case '"':
        inString = true;
        break;
      case "{":
      case "[":
        openers.push(char);
        break;
      case "}":
      case "]": {
        const opener = char === "}" ? "{" : "[";
        const match = openers.lastIndexOf(opener);
        if (match >= 0) {
          openers.length = match;
          break;
        }
        if (char === "]") {
          elements.push(text.slice(elementStart, index));
          if (!TRAILING_WHITESPACE.test(text.slice(index + 1))) {
            return null;
          }
          // "[]" and "[ ]" hold no element at all.
          return elements.length === 1 && firstSignificantIndex(elements[0]) === -1 ? [] : elements;
        }
        break;
      }
      case ",":
        if (openers.length === 0) {
          elements.push(text.slice(elementStart, index));
          elementStart = index + 1;
        }
        break;
      default:
        break;
    }
  }

  return null;
}
