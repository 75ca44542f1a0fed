/**
 * Per-dispatch key/value store shared by every extractor and the handler.
 *
 * The scheduler owns a {@link Context}: it creates one per update, fills it
 * before dispatch and drops it once the handler has finished. Everything
 * downstream only sees the {@link ReadonlyContext} view.
 *
 * Keys are declared on {@link ContextValues}; applications add their own
 * by augmenting this module:
 *
 * ```ts
 * declare module "./dispatch/context.js" {
 *   interface ContextValues {
 *     locale: string;
 *   }
 * }
 * ```
 */

import type { TgChat, TgUpdate, TgUser } from "../telegram/types.js";
import { updateChat, updateThreadId, updateUser } from "../telegram/update.js";

export interface ContextValues {
  /** Sender of the update, set by {@link seedEventContext} */
  eventUser?: TgUser;
  /** Chat of the update, set by {@link seedEventContext} */
  eventChat?: TgChat;
  /** Forum thread of the update's message, set by {@link seedEventContext} */
  eventThreadId?: number;
}

export type ContextKey = keyof ContextValues & string;

export interface ReadonlyContext {
  get<K extends ContextKey>(key: K): ContextValues[K] | undefined;
  has(key: ContextKey): boolean;
  keys(): ContextKey[];
}

export class Context implements ReadonlyContext {
  private readonly values: Partial<ContextValues> = {};
  private readonly present = new Set<ContextKey>();

  get<K extends ContextKey>(key: K): ContextValues[K] | undefined {
    return this.values[key];
  }

  has(key: ContextKey): boolean {
    return this.present.has(key);
  }

  keys(): ContextKey[] {
    return [...this.present];
  }

  set<K extends ContextKey>(key: K, value: ContextValues[K]): this {
    this.values[key] = value;
    this.present.add(key);
    return this;
  }

  delete(key: ContextKey): boolean {
    delete this.values[key];
    return this.present.delete(key);
  }
}

/** Store the update's sender, chat and forum thread under the `event*` keys. */
export function seedEventContext(context: Context, update: TgUpdate): Context {
  const user = updateUser(update);
  if (user) context.set("eventUser", user);

  const chat = updateChat(update);
  if (chat) context.set("eventChat", chat);

  const threadId = updateThreadId(update);
  if (threadId !== undefined) context.set("eventThreadId", threadId);

  return context;
}
