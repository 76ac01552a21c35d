/**
 * Wire-level exception protocol.
 *
 * A failed call is answered with a body holding exactly one reserved key,
 * never mixed with ordinary response fields:
 *
 *   { "__exception__": { "cls": "<name>", "args": [<primitives>] } }
 */

import { z } from "zod";
import type { FaultDescription } from "./exceptions.js";

export const EXCEPTION_KEY = "__exception__";

/** Identity every non-whitelisted fault collapses to outside debug mode. */
export const REDACTED_FAULT: Readonly<FaultDescription> = Object.freeze({
  cls: "RequestException",
  args: [500],
});

export const FaultPayloadSchema = z.object({
  cls: z.string().min(1),
  args: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

export function faultBody(fault: FaultDescription): Record<string, unknown> {
  return { [EXCEPTION_KEY]: { cls: fault.cls, args: [...fault.args] } };
}
