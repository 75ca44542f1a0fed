/**
 * Two-phase dispatch. Phase A extracts every parameter and commits to a
 * {@link PreparedCall}; Phase B runs the handler body, at most once. A
 * scheduler may retry or cancel Phase A freely and decide separately
 * whether to start Phase B.
 */

import { classify, describeClassification } from "../classify/index.js";
import { createLogger, type Logger } from "../logger.js";
import type { TelegramClient } from "../telegram/client.js";
import type { TgUpdate } from "../telegram/types.js";
import { Context, seedEventContext, type ReadonlyContext } from "./context.js";
import { DispatchAbortError, DispatchCancelledError } from "./errors.js";
import { extractArguments, type Extracted, type Handler, type ParameterList } from "./handler.js";

export type DispatchError = DispatchAbortError | DispatchCancelledError;

export type DispatchResult<R> = { status: "completed"; value: Awaited<R> } | { status: "aborted"; error: DispatchError };

export type CallState = "ready" | "aborted" | "running" | "completed" | "failed";

/** What a scheduler holding many differently-shaped handlers sees. */
export interface Dispatchable<R = unknown> {
  readonly name: string;
  invoke(
    client: TelegramClient,
    update: TgUpdate,
    context?: ReadonlyContext,
    signal?: AbortSignal,
  ): Promise<DispatchResult<R>>;
}

export interface DispatchAdapterOptions {
  logger?: Logger;
  /** Log every raw update at debug level before extraction */
  logUpdates?: boolean;
}

type Prepared<L extends ParameterList> = { ok: true; args: Extracted<L> } | { ok: false; error: DispatchError };

export class PreparedCall<L extends ParameterList, R> {
  private current: CallState;
  private abortError: DispatchError | undefined;
  private readonly args: Extracted<L> | undefined;

  constructor(
    private readonly handler: Handler<L, R>,
    prepared: Prepared<L>,
    private readonly logger: Logger,
    private readonly signal?: AbortSignal,
  ) {
    if (prepared.ok) {
      this.current = "ready";
      this.args = prepared.args;
    } else {
      this.current = "aborted";
      this.abortError = prepared.error;
    }
  }

  get state(): CallState {
    return this.current;
  }

  /** Why the call was aborted, once it is. */
  get error(): DispatchError | undefined {
    return this.abortError;
  }

  /**
   * Phase B. Runs the body if the call is ready and the signal has not
   * fired. Errors thrown by the body reject the returned promise.
   */
  async run(): Promise<DispatchResult<R>> {
    if (this.current === "ready" && this.signal?.aborted) {
      this.abort(new DispatchCancelledError(this.handler.name, this.signal.reason));
    }
    if (this.current === "aborted" && this.abortError) {
      return { status: "aborted", error: this.abortError };
    }
    if (this.current !== "ready" || this.args === undefined) {
      throw new Error(`Handler "${this.handler.name}" has already run (state: ${this.current})`);
    }

    this.current = "running";
    this.logger.debug("Running handler");
    try {
      const value = await this.handler.body(...this.args);
      this.current = "completed";
      this.logger.debug("Handler completed");
      return { status: "completed", value };
    } catch (e) {
      this.current = "failed";
      this.logger.error({ err: e }, "Handler failed");
      throw e;
    }
  }

  private abort(error: DispatchError): void {
    this.current = "aborted";
    this.abortError = error;
    this.logger.warn({ reason: error.message }, "Dispatch cancelled");
  }
}

export class DispatchAdapter<L extends ParameterList, R> implements Dispatchable<R> {
  private readonly logger: Logger;
  private readonly logUpdates: boolean;

  constructor(
    private readonly handler: Handler<L, R>,
    options: DispatchAdapterOptions = {},
  ) {
    this.logger = (options.logger ?? createLogger({ component: "dispatch" })).child({ handler: handler.name });
    this.logUpdates = options.logUpdates ?? false;
  }

  get name(): string {
    return this.handler.name;
  }

  /**
   * Phase A. Without a context, a fresh one seeded with the update's
   * sender, chat and thread is used.
   */
  async prepare(
    client: TelegramClient,
    update: TgUpdate,
    context?: ReadonlyContext,
    signal?: AbortSignal,
  ): Promise<PreparedCall<L, R>> {
    const logger = this.logger.child({
      updateId: update.update_id,
      updateType: describeClassification(classify(update)),
    });
    const shared = context ?? seedEventContext(new Context(), update);
    if (this.logUpdates) logger.debug({ update }, "Update received");

    if (signal?.aborted) {
      logger.warn("Dispatch cancelled before extraction");
      return new PreparedCall(
        this.handler,
        { ok: false, error: new DispatchCancelledError(this.handler.name, signal.reason) },
        logger,
        signal,
      );
    }

    logger.debug({ parameters: this.handler.params.length }, "Extracting parameters");
    const outcome = await extractArguments(this.handler.params, client, update, shared);
    if (!outcome.ok) {
      const error = new DispatchAbortError(this.handler.name, outcome.index, outcome.name, outcome.error);
      logger.warn(
        { parameter: outcome.index, extractor: outcome.name, reason: outcome.error.message },
        "Dispatch aborted",
      );
      return new PreparedCall(this.handler, { ok: false, error }, logger, signal);
    }

    logger.debug("Parameters ready");
    return new PreparedCall(this.handler, { ok: true, args: outcome.value }, logger, signal);
  }

  /** Both phases in sequence. */
  async invoke(
    client: TelegramClient,
    update: TgUpdate,
    context?: ReadonlyContext,
    signal?: AbortSignal,
  ): Promise<DispatchResult<R>> {
    const call = await this.prepare(client, update, context, signal);
    return call.run();
  }
}
