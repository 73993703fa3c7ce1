import { isInteger, parse, stringify } from "lossless-json";

/**
 * Integer literals outside the safe range become `bigint` so ids such as
 * 9007199254740993 survive the round trip. Every other number is read the way
 * `JSON.parse` reads it.
 */
function parseNumberToken(token: string): number | bigint {
  const value = Number.parseFloat(token);
  return isInteger(token) && !Number.isSafeInteger(value) ? BigInt(token) : value;
}

/** `JSON.parse` without precision loss on large integers. Throws `SyntaxError`. */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumberToken);
}

/**
 * `JSON.stringify` counterpart of {@link parseJson}: `bigint` values are
 * written as bare integer literals.
 */
export function stringifyJson(value: unknown): string | undefined {
  return stringify(value);
}
