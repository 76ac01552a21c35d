/**
 * Processor: the per-call state machine behind both client and service.
 *
 *   request --(units consumed)--> operation --(units consumed)--> function --(execute)--> done
 *
 * One index walks the units of the current scope. When it runs off the end
 * the machine promotes to the next scope and resets the index; in the
 * function scope it runs the terminal action instead.
 *
 * Scopes nest through the continuation calls, so the frame that entered a
 * scope is also the frame that sees the whole subtree finish. That frame
 * fires exitScope, which is why exitScope("operation") happens before the
 * "after" halves of request-scope units.
 *
 * A processor is single-use: calling process() again fails with
 * ALREADY_PROCESSED.
 */

import { Container } from "./container.js";
import { CallContext } from "./context.js";
import type { OperationDescriptor } from "./description.js";
import { RpcError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { PluginRegistry, Scope } from "./plugins.js";

export type ProcessorScope = Scope | "function";
export type ProcessorState = ProcessorScope | "done";

const NEXT_STATE: Readonly<Record<ProcessorScope, ProcessorState>> = {
  request: "operation",
  operation: "function",
  function: "done",
};

export interface ProcessorParams {
  descriptor: OperationDescriptor;
  plugins: PluginRegistry;
  log?: Logger;
}

export abstract class Processor<TResult> {
  readonly descriptor: OperationDescriptor;
  readonly request = new Container();
  readonly response = new Container();
  /** Scratch space shared by every unit of this call. */
  readonly locals = new Container();

  requestBody: string | null = null;
  responseBody: string | null = null;

  protected readonly plugins: PluginRegistry;
  protected readonly log: Logger;

  private current: ProcessorState = "request";
  private index = -1;
  private invoked = false;

  constructor(params: ProcessorParams) {
    this.descriptor = params.descriptor;
    this.plugins = params.plugins;
    this.log = params.log ?? {};
  }

  get state(): ProcessorState {
    return this.current;
  }

  get operation(): string {
    return this.descriptor.name;
  }

  /**
   * Run the pipeline once and return the result. Faults from any scope
   * reach onFault() exactly once.
   */
  async process(): Promise<TResult> {
    if (this.invoked) {
      throw new RpcError({
        code: "ALREADY_PROCESSED",
        message: `switchrpc-core:Processor.process - ${this.operation} was already processed`,
      });
    }
    this.invoked = true;
    this.plugins.finalize();
    try {
      await this.continueExecution();
    } catch (err) {
      await this.onFault(err);
    }
    return this.result;
  }

  /** Terminal action of the function scope. */
  protected abstract execute(): Promise<void>;

  abstract get result(): TResult;

  /** Fires once, before the first unit of `scope` runs. */
  protected async enterScope(_scope: ProcessorScope): Promise<void> {}

  /** Fires once, after `scope` and everything nested inside it has finished. */
  protected async exitScope(_scope: ProcessorScope): Promise<void> {}

  /** Outer fault boundary. Rethrows unless a subclass marshals the fault. */
  protected async onFault(err: unknown): Promise<void> {
    throw err;
  }

  private async continueExecution(): Promise<void> {
    const scope = this.current;
    if (scope === "done") {
      throw new RpcError({
        code: "ALREADY_PROCESSED",
        message: `switchrpc-core:Processor.continueExecution - ${this.operation} already executed`,
      });
    }

    const entering = this.index === -1;
    if (entering) await this.enterScope(scope);

    if (scope === "function") {
      await this.execute();
      this.current = "done";
    } else {
      await this.dispatch(scope);
    }

    if (entering) await this.exitScope(scope);
  }

  private async dispatch(scope: Scope): Promise<void> {
    this.index += 1;

    if (this.index < this.plugins.count(scope)) {
      const context = new CallContext(this, () => this.continueExecution());
      if (scope === "request") {
        await this.plugins.units("request")[this.index](context);
      } else {
        await this.plugins.units("operation")[this.index](this.request, this.response, context);
      }
      return;
    }

    this.current = NEXT_STATE[scope];
    this.index = -1;
    await this.continueExecution();
  }
}
