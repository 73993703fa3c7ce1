import { ZodError, ZodType, type ZodTypeDef } from "zod";

import { InvalidParamsError, errorText } from "./errors.js";
import { parseJson } from "./json.js";
import { RawJson, type RequestEnvelope } from "./protocol.js";

/**
 * Extraction capability: validates an envelope and decodes the value handed to
 * a typed handler. Any failure is reported to the caller as Invalid params.
 */
export interface Extractor<P> {
  extract(envelope: RequestEnvelope): P | Promise<P>;
}

/** Zod schema whose parsed output is {@link P}, whatever its input type. */
export type ParamsSchema<P> = ZodType<P, ZodTypeDef, unknown>;

/** Anything accepted where an extractor is expected. */
export type ExtractorLike<P> = Extractor<P> | ParamsSchema<P>;

/**
 * Structured form of the envelope params: `RawJson` is parsed, absent params
 * become `undefined`.
 */
export function decodeParams(envelope: RequestEnvelope): unknown {
  const { params } = envelope;
  if (params instanceof RawJson) {
    try {
      return parseJson(params.text);
    } catch {
      throw new InvalidParamsError({ hint: "params are not valid JSON" });
    }
  }
  return params;
}

/**
 * Flattens zod issues into the `{ hint, issues }` data of Invalid params.
 * Issues on the params as a whole feed the hint; the others are grouped by
 * dotted path.
 */
export function formatZodIssues(error: ZodError): { hint: string; issues: Record<string, string[]> } {
  const formErrors: string[] = [];
  const issues: Record<string, string[]> = {};
  for (const issue of error.issues) {
    if (issue.path.length === 0) {
      formErrors.push(issue.message);
      continue;
    }
    (issues[issue.path.join(".")] ??= []).push(issue.message);
  }

  const hint =
    formErrors.length > 0
      ? formErrors.join("; ")
      : error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
  return { hint: hint || "Invalid parameters", issues };
}

/**
 * Decodes params with a zod schema. Tuples suit by-position params, objects
 * by-name params.
 */
export function params<P>(schema: ParamsSchema<P>): Extractor<P> {
  return {
    async extract(envelope) {
      const parsed = await schema.safeParseAsync(decodeParams(envelope));
      if (!parsed.success) {
        throw new InvalidParamsError(formatZodIssues(parsed.error));
      }
      return parsed.data;
    },
  };
}

/** Hands the decoded params over without validation. */
export function rawParams(): Extractor<unknown> {
  return { extract: decodeParams };
}

/** Wraps a custom decoder; whatever it throws becomes Invalid params. */
export function paramsWith<P>(decode: (params: unknown, envelope: RequestEnvelope) => P | Promise<P>): Extractor<P> {
  return {
    extract: (envelope) => decode(decodeParams(envelope), envelope),
  };
}

export function toExtractor<P>(candidate: ExtractorLike<P>): Extractor<P> {
  return candidate instanceof ZodType ? params(candidate) : candidate;
}

/** Runs {@link extractor}, reporting every failure as Invalid params. */
export async function runExtractor<P>(extractor: Extractor<P>, envelope: RequestEnvelope): Promise<P> {
  try {
    return await extractor.extract(envelope);
  } catch (error) {
    if (error instanceof InvalidParamsError) {
      throw error;
    }
    if (error instanceof ZodError) {
      throw new InvalidParamsError(formatZodIssues(error));
    }
    throw new InvalidParamsError({ hint: errorText(error) });
  }
}
