import type { Container } from "./container.js";
import type { OperationDescriptor } from "./description.js";
import { RpcError } from "./errors.js";

/** The parts of a running call a unit may read. */
export interface CallState {
  readonly descriptor: OperationDescriptor;
  readonly request: Container;
  readonly response: Container;
  readonly locals: Container;
  readonly requestBody: string | null;
  readonly responseBody: string | null;
}

/**
 * Per-unit view of a call. `locals` is shared by every unit of the call;
 * the continuation belongs to this unit alone.
 *
 * The wire bodies are live: a request-scope unit reading `responseBody`
 * after `await context.continue()` sees the encoded (or received) text.
 *
 * Calling `continue()` more than once from the same unit is a caller bug
 * and fails with CONTINUATION_REUSED instead of re-running the chain.
 */
export class CallContext {
  private continued = false;

  constructor(
    private readonly call: CallState,
    private readonly proceed: () => Promise<void>
  ) {}

  get descriptor(): OperationDescriptor {
    return this.call.descriptor;
  }

  get operation(): string {
    return this.call.descriptor.name;
  }

  get locals(): Container {
    return this.call.locals;
  }

  get request(): Container {
    return this.call.request;
  }

  get response(): Container {
    return this.call.response;
  }

  get requestBody(): string | null {
    return this.call.requestBody;
  }

  get responseBody(): string | null {
    return this.call.responseBody;
  }

  async continue(): Promise<void> {
    if (this.continued) {
      throw new RpcError({
        code: "CONTINUATION_REUSED",
        message: `switchrpc-core:CallContext.continue - continue() called twice while processing ${this.operation}`,
      });
    }
    this.continued = true;
    await this.proceed();
  }
}
