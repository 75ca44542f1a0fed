/**
 * Capability extraction: how a handler parameter is produced from the
 * `(client, update, context)` triple of one dispatch.
 *
 * Extractors never throw for an update of the wrong shape; they return a
 * failed {@link ExtractionOutcome} so `optional` and `fallible` can recover.
 */

import type { TelegramClient } from "../telegram/client.js";
import { scopedClient } from "../telegram/client.js";
import type { TgChat, TgUpdate, TgUser } from "../telegram/types.js";
import { updateChat, updateText, updateThreadId, updateUser } from "../telegram/update.js";
import { describeClassification, classify } from "../classify/index.js";
import type { ContextKey, ContextValues, ReadonlyContext } from "./context.js";
import { ContextValueError, ExtractionError, ShapeMismatchError } from "./errors.js";

export type ExtractionOutcome<T, E = ExtractionError> = { ok: true; value: T } | { ok: false; error: E };

export type MaybePromise<T> = T | Promise<T>;

export interface Extractor<T, E extends ExtractionError = ExtractionError> {
  /** Shown in diagnostics and abort errors */
  readonly name: string;
  extract(client: TelegramClient, update: TgUpdate, context: ReadonlyContext): MaybePromise<ExtractionOutcome<T, E>>;
}

/** The value type an extractor produces. */
export type ExtractedValue<X> = X extends Extractor<infer T, ExtractionError> ? T : never;

/** The error type an extractor can fail with. */
export type ExtractedError<X> = X extends Extractor<unknown, infer E> ? E : never;

export function produced<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failed<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Build an extractor from a plain function. */
export function extractor<T, E extends ExtractionError = ExtractionError>(
  name: string,
  extract: Extractor<T, E>["extract"],
): Extractor<T, E> {
  return { name, extract };
}

/** Never fails; the value is `undefined` exactly when `inner` fails. */
export function optional<T, E extends ExtractionError>(inner: Extractor<T, E>): Extractor<T | undefined, never> {
  return extractor<T | undefined, never>(`Optional<${inner.name}>`, async (client, update, context) => {
    const outcome = await inner.extract(client, update, context);
    return produced(outcome.ok ? outcome.value : undefined);
  });
}

/** Never fails; the value is `inner`'s outcome itself. */
export function fallible<T, E extends ExtractionError>(
  inner: Extractor<T, E>,
): Extractor<ExtractionOutcome<T, E>, never> {
  return extractor<ExtractionOutcome<T, E>, never>(`Fallible<${inner.name}>`, async (client, update, context) =>
    produced(await inner.extract(client, update, context)),
  );
}

// Always-available parameters

export const Client = extractor<TelegramClient, never>("Client", (client) => produced(client));

export const RawUpdate = extractor<TgUpdate, never>("Update", (_client, update) => produced(update));

export const SharedContext = extractor<ReadonlyContext, never>("Context", (_client, _update, context) =>
  produced(context),
);

/** The client, scoped to the forum thread the update came from. */
export const ScopedClient = extractor<TelegramClient, never>("ScopedClient", (client, update) =>
  produced(scopedClient(client, updateThreadId(update))),
);

// Update-derived parameters

export function isPresent<T>(value: T): value is NonNullable<T> {
  return value !== undefined && value !== null;
}

function derived<T>(name: string, read: (update: TgUpdate) => T | undefined): Extractor<T, ShapeMismatchError> {
  return extractor<T, ShapeMismatchError>(name, (_client, update) => {
    const value = read(update);
    if (!isPresent(value)) return failed(new ShapeMismatchError(name, describeClassification(classify(update))));
    return produced(value);
  });
}

/** The user who caused the update. */
export const User: Extractor<TgUser, ShapeMismatchError> = derived("User", updateUser);

/** The chat the update happened in. */
export const Chat: Extractor<TgChat, ShapeMismatchError> = derived("Chat", updateChat);

/** The forum thread of the update's message. */
export const ThreadId: Extractor<number, ShapeMismatchError> = derived("ThreadId", updateThreadId);

/** Message text or caption, query text, callback data, invoice payload or poll question. */
export const UpdateText: Extractor<string, ShapeMismatchError> = derived("Text", updateText);

/** A value the scheduler stored in the context before dispatch. */
export function fromContext<K extends ContextKey>(
  key: K,
): Extractor<NonNullable<ContextValues[K]>, ContextValueError> {
  return extractor<NonNullable<ContextValues[K]>, ContextValueError>(`Context<${key}>`, (_client, _update, context) => {
    const value = context.get(key);
    if (!isPresent(value)) return failed(new ContextValueError(key));
    return produced(value);
  });
}
