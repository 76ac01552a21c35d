/**
 * Scoped middleware ("plugin") registry.
 *
 * Units run in registration order and continue the chain explicitly by
 * awaiting `context.continue()`. Code after that await is the unit's
 * "after" half, so the last registered unit unwinds first. A unit that
 * returns without continuing ends the whole pipeline at that point.
 *
 * The registry is append-only until the first call is processed; from then
 * on every call sees the same chain.
 */

import type { Container } from "./container.js";
import type { CallContext } from "./context.js";
import { RpcError } from "./errors.js";

export type Scope = "request" | "operation";

export const SCOPES: readonly Scope[] = ["request", "operation"];

export type RequestUnit = (context: CallContext) => Promise<void>;

export type OperationUnit = (
  request: Container,
  response: Container,
  context: CallContext
) => Promise<void>;

export interface ScopeUnits {
  request: RequestUnit;
  operation: OperationUnit;
}

export class PluginRegistry {
  private readonly lists: { [S in Scope]: ScopeUnits[S][] } = { request: [], operation: [] };
  private sealed = false;

  use<S extends Scope>(scope: S, unit: ScopeUnits[S]): this {
    if (!SCOPES.includes(scope)) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `switchrpc-core:PluginRegistry.use - Unknown scope: ${String(scope)}`,
      });
    }
    if (this.sealed) {
      throw new RpcError({
        code: "REGISTRY_FINALIZED",
        message: `switchrpc-core:PluginRegistry.use - Cannot add ${scope} plugins after the first call`,
      });
    }
    const list: ScopeUnits[S][] = this.lists[scope];
    list.push(unit);
    return this;
  }

  units<S extends Scope>(scope: S): readonly ScopeUnits[S][] {
    return this.lists[scope];
  }

  count(scope: Scope): number {
    return this.lists[scope].length;
  }

  finalize(): void {
    this.sealed = true;
  }

  get finalized(): boolean {
    return this.sealed;
  }
}
