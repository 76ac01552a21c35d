/**
 * Fault types and the per-instance exception registry.
 *
 * A fault crosses the wire as a name plus an ordered list of primitive
 * arguments. The receiving side looks the name up in its own registry,
 * so identity is matched by name only: two registries hand out different
 * classes for the same name, one registry always hands out the same class.
 */

export type FaultArg = string | number | boolean | null;

export interface FaultDescription {
  cls: string;
  args: FaultArg[];
}

/**
 * Base class for faults raised by handlers and plugins.
 * The instance name is the (possibly dynamically assigned) class name.
 */
export class Fault extends Error {
  public readonly args: FaultArg[];

  constructor(...args: FaultArg[]) {
    super(formatMessage(args));
    this.name = new.target.name;
    this.args = args;
  }
}

export type FaultClass = typeof Fault;
export type BuiltinErrorClass = new (message?: string) => Error;
export type ErrorClass = FaultClass | BuiltinErrorClass;

/** Builtin names are reserved and resolve to the real constructors. */
const BUILTIN_ERRORS: ReadonlyMap<string, BuiltinErrorClass> = new Map<string, BuiltinErrorClass>([
  ["Error", Error],
  ["TypeError", TypeError],
  ["RangeError", RangeError],
  ["SyntaxError", SyntaxError],
  ["ReferenceError", ReferenceError],
  ["EvalError", EvalError],
  ["URIError", URIError],
]);

export function isFaultArg(value: unknown): value is FaultArg {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function formatMessage(args: readonly FaultArg[]): string {
  return args.map(String).join(", ");
}

export class ExceptionRegistry {
  private readonly classes = new Map<string, FaultClass>();

  /**
   * Resolve a fault type by name, creating and caching it on first use.
   */
  get(name: string): ErrorClass {
    return BUILTIN_ERRORS.get(name) ?? this.fault(name);
  }

  /** Like get(), but never resolves to a builtin. */
  fault(name: string): FaultClass {
    const cached = this.classes.get(name);
    if (cached) return cached;
    const cls = class extends Fault {};
    Object.defineProperty(cls, "name", { value: name });
    this.classes.set(name, cls);
    return cls;
  }

  /**
   * Instantiate the fault named `name` with `args`. Builtin errors take the
   * joined args as their message and keep the original list on `args`.
   */
  create(name: string, args: readonly FaultArg[] = []): Error {
    const builtin = BUILTIN_ERRORS.get(name);
    if (!builtin) return new (this.fault(name))(...args);
    const err = new builtin(formatMessage(args));
    Object.defineProperty(err, "args", { value: [...args], enumerable: false });
    return err;
  }

  get size(): number {
    return this.classes.size;
  }
}

/**
 * Capture the wire identity of any thrown value.
 */
export function describeFault(err: unknown): FaultDescription {
  if (err instanceof Fault) {
    return { cls: err.name, args: [...err.args] };
  }
  if (err instanceof Error) {
    if ("args" in err && Array.isArray(err.args)) {
      return { cls: err.name, args: err.args.filter(isFaultArg) };
    }
    return { cls: err.name, args: err.message ? [err.message] : [] };
  }
  return { cls: "Error", args: [String(err)] };
}
