/**
 * Handlers over 0 to 12 independently extracted parameters. The parameter
 * list is a tuple of extractors; the body's argument types are inferred
 * from it, so a body that disagrees with its extractors does not compile.
 */

import type { TelegramClient } from "../telegram/client.js";
import type { TgUpdate } from "../telegram/types.js";
import type { ReadonlyContext } from "./context.js";
import type { ExtractionError } from "./errors.js";
import type { ExtractedValue, Extractor, MaybePromise } from "./extractor.js";

export const MAX_ARITY = 12;

export type AnyExtractor = Extractor<unknown, ExtractionError>;

type TupleUpTo<T, N extends number, Acc extends readonly T[] = []> = Acc["length"] extends N
  ? Acc
  : Acc | TupleUpTo<T, N, readonly [...Acc, T]>;

/** Every extractor tuple of length 0 through 12. */
export type ParameterList = TupleUpTo<AnyExtractor, typeof MAX_ARITY>;

/** The positional arguments a parameter list produces. */
export type Extracted<L extends ParameterList> = { -readonly [I in keyof L]: ExtractedValue<L[I]> };

export type HandlerBody<L extends ParameterList, R> = (...args: Extracted<L>) => MaybePromise<R>;

export interface Handler<L extends ParameterList, R> {
  readonly name: string;
  readonly params: L;
  readonly body: HandlerBody<L, R>;
}

export function defineHandler<const L extends ParameterList, R>(
  params: L,
  body: HandlerBody<L, R>,
  name = body.name || "anonymous",
): Handler<L, R> {
  if (params.length > MAX_ARITY) {
    throw new RangeError(`Handler "${name}" declares ${params.length} parameters; at most ${MAX_ARITY} are supported`);
  }
  return { name, params, body };
}

export type ArgumentsOutcome<L extends ParameterList> =
  | { ok: true; value: Extracted<L> }
  | { ok: false; index: number; name: string; error: ExtractionError };

/**
 * Run every extractor, left to right, against the same triple. Stops at the
 * first failure, so the first declared parameter wins.
 */
export async function extractArguments<L extends ParameterList>(
  params: L,
  client: TelegramClient,
  update: TgUpdate,
  context: ReadonlyContext,
): Promise<ArgumentsOutcome<L>> {
  const list: readonly AnyExtractor[] = params;
  const values: unknown[] = [];
  for (const [index, param] of list.entries()) {
    const outcome = await param.extract(client, update, context);
    if (!outcome.ok) return { ok: false, index, name: param.name, error: outcome.error };
    values.push(outcome.value);
  }
  // Each value came from the extractor at the same position.
  return { ok: true, value: values as Extracted<L> };
}
