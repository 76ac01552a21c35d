/**
 * Declarative API description: parsing, validation and the derived
 * client/server path forms.
 *
 * Unknown keys are kept as metadata at every level so that newer
 * descriptions still load in older runtimes.
 */

import { z } from "zod";
import { RpcError } from "./errors.js";
import { validateName } from "./names.js";

const OPERATION_PLACEHOLDER = "{operation}";
const VERSION_PLACEHOLDER = "{version}";

export const EndpointDescriptionSchema = z
  .object({
    scheme: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().positive().optional(),
    pattern: z.string().min(1).optional(),
  })
  .passthrough();

export const OperationDescriptionSchema = z
  .object({
    name: z.string(),
    input: z.array(z.string()).default([]),
    output: z.array(z.string()).default([]),
  })
  .passthrough();

export const ApiDescriptionSchema = z
  .object({
    name: z.string().min(1),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    endpoint: EndpointDescriptionSchema.optional(),
    timeout: z.number().positive().optional(),
    debug: z.boolean().optional(),
    exceptions: z.array(z.string()).optional(),
    operations: z.array(OperationDescriptionSchema).optional(),
  })
  .passthrough();

export type ApiDescription = z.input<typeof ApiDescriptionSchema>;

export interface Endpoint {
  scheme?: string;
  host?: string;
  port?: number;
  pattern?: string;
  metadata: Record<string, unknown>;
}

export interface OperationDescriptor {
  readonly name: string;
  readonly input: readonly string[];
  readonly output: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** Template copied into every ApiConfig; never handed out directly. */
export const DEFAULT_API = {
  version: "0",
  timeoutMs: 2_000,
  debug: false,
  endpoint: {
    scheme: "http",
    host: "localhost",
    port: 8080,
    pattern: "/api/{version}/{operation}",
  },
} as const;

function omit(record: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !keys.includes(key)));
}

function validateFields(fields: readonly string[], label: string): string[] {
  const seen = new Set<string>();
  for (const field of fields) {
    validateName(field, label);
    if (seen.has(field)) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `switchrpc-core:description - Duplicate ${label}: ${field}`,
      });
    }
    seen.add(field);
  }
  return [...fields];
}

export function createOperationDescriptor(
  data: z.output<typeof OperationDescriptionSchema>
): OperationDescriptor {
  const name = validateName(data.name, "operation name");
  return Object.freeze({
    name,
    input: Object.freeze(validateFields(data.input, `input field of ${name}`)),
    output: Object.freeze(validateFields(data.output, `output field of ${name}`)),
    metadata: Object.freeze(omit(data, ["name", "input", "output"])),
  });
}

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class ApiConfig {
  readonly name: string;
  readonly version: string;
  readonly endpoint: Endpoint;
  readonly timeoutMs: number;
  readonly debug: boolean;
  readonly exceptions: ReadonlySet<string>;
  readonly operations: ReadonlyMap<string, OperationDescriptor>;
  readonly metadata: Readonly<Record<string, unknown>>;

  private clientFormat?: string;
  private serverPattern?: RegExp;

  constructor(description: z.output<typeof ApiDescriptionSchema>) {
    const defaults = structuredClone(DEFAULT_API);

    this.name = description.name;
    this.version = description.version ?? defaults.version;
    this.timeoutMs = description.timeout !== undefined ? description.timeout * 1000 : defaults.timeoutMs;
    this.debug = description.debug ?? defaults.debug;

    // A supplied endpoint replaces the default one wholesale.
    const endpoint = description.endpoint ?? defaults.endpoint;
    this.endpoint = {
      scheme: endpoint.scheme,
      host: endpoint.host,
      port: endpoint.port,
      pattern: endpoint.pattern,
      metadata: omit(endpoint, ["scheme", "host", "port", "pattern"]),
    };

    this.exceptions = new Set(
      (description.exceptions ?? []).map((name) => validateName(name, "exception name"))
    );

    const operations = new Map<string, OperationDescriptor>();
    for (const data of description.operations ?? []) {
      const op = createOperationDescriptor(data);
      if (operations.has(op.name)) {
        throw new RpcError({
          code: "VALIDATION_ERROR",
          message: `switchrpc-core:description - Duplicate operation: ${op.name}`,
        });
      }
      operations.set(op.name, op);
    }
    this.operations = operations;

    this.metadata = omit(description, [
      "name",
      "version",
      "endpoint",
      "timeout",
      "debug",
      "exceptions",
      "operations",
    ]);

    if (this.endpoint.pattern !== undefined) this.checkPattern(this.endpoint.pattern);
  }

  operation(name: string): OperationDescriptor {
    const op = this.operations.get(name);
    if (!op) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `switchrpc-core:ApiConfig.operation - Unknown operation: ${name}`,
      });
    }
    return op;
  }

  /**
   * Absolute call URI format, e.g. `http://localhost:8080/api/1/{operation}`.
   */
  clientPattern(): string {
    if (this.clientFormat !== undefined) return this.clientFormat;
    const { scheme, host, port, pattern } = this.endpoint;
    if (!scheme || !host || port === undefined || !pattern) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message:
          "switchrpc-core:ApiConfig.clientPattern - endpoint requires scheme, host, port and pattern",
        details: { scheme, host, port, pattern },
      });
    }
    this.clientFormat = `${scheme}://${host}:${port}${this.serverPath()}`;
    return this.clientFormat;
  }

  clientUri(operation: string): string {
    return this.clientPattern().replace(OPERATION_PLACEHOLDER, operation);
  }

  /** Server-side path for one operation, e.g. `/api/1/upper`. */
  path(operation: string): string {
    return this.serverPath().replace(OPERATION_PLACEHOLDER, operation);
  }

  /**
   * Matcher for inbound paths; captures the operation name in the
   * `operation` group and tolerates one trailing slash.
   */
  serverMatcher(): RegExp {
    if (this.serverPattern) return this.serverPattern;
    const [before, after] = this.serverPath().split(OPERATION_PLACEHOLDER);
    this.serverPattern = new RegExp(
      `^${escapeRegExp(before)}(?<operation>[^/]+)${escapeRegExp(after)}/?$`
    );
    return this.serverPattern;
  }

  /** Operation name addressed by `path`, or null when the path does not match. */
  matchOperation(path: string): string | null {
    return this.serverMatcher().exec(path)?.groups?.operation ?? null;
  }

  private serverPath(): string {
    const pattern = this.endpoint.pattern;
    if (!pattern) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: "switchrpc-core:ApiConfig.serverPath - endpoint requires a pattern",
      });
    }
    this.checkPattern(pattern);
    return pattern.split(VERSION_PLACEHOLDER).join(this.version);
  }

  private checkPattern(pattern: string): void {
    const count = countOccurrences(pattern, OPERATION_PLACEHOLDER);
    if (count !== 1) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `switchrpc-core:ApiConfig - endpoint pattern must contain exactly one ${OPERATION_PLACEHOLDER}, found ${count}`,
        details: { pattern },
      });
    }
  }
}

/**
 * Build an ApiConfig from a parsed description object.
 */
export function fromDescription(obj: unknown): ApiConfig {
  const parsed = ApiDescriptionSchema.safeParse(obj);
  if (!parsed.success) {
    throw new RpcError({
      code: "VALIDATION_ERROR",
      message: "switchrpc-core:fromDescription - Invalid API description",
      details: parsed.error.format(),
    });
  }
  return new ApiConfig(parsed.data);
}
