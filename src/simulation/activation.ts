import nerdamer from "nerdamer";
import { ACTIVATION_CACHE_SIZE } from "../constants";
import { ActivationCompileError } from "./errors";
import type { ChannelTriple } from "./channels";

/** Maps a channel's accumulated convolution sum to its next value. */
export type Activation = (x: number) => number;

export const BUILTIN_ACTIVATION_NAMES = [
  "identity",
  "soft-gaussian",
  "abs",
  "scaled-abs",
  "sigmoid",
  "tanh",
] as const;

export type BuiltinActivationName = typeof BUILTIN_ACTIVATION_NAMES[number];

export const BUILTIN_ACTIVATIONS: Record<BuiltinActivationName, Activation> = {
  "identity": (x) => x,
  "soft-gaussian": (x) => 1 - 2 ** (-0.6 * x * x),
  "abs": (x) => Math.abs(x),
  "scaled-abs": (x) => Math.abs(1.2 * x),
  "sigmoid": (x) => 1 / (1 + Math.exp(-x)),
  "tanh": (x) => Math.tanh(x),
};

/** Human-readable formula for each built-in, shown in the controls. */
export const BUILTIN_ACTIVATION_LABELS: Record<BuiltinActivationName, string> = {
  "identity": "x",
  "soft-gaussian": "1 - 2^(-0.6x²)",
  "abs": "|x|",
  "scaled-abs": "|1.2x|",
  "sigmoid": "1 / (1 + e^-x)",
  "tanh": "tanh(x)",
};

/**
 * Where a channel's activation comes from: one of the built-ins, or a user
 * expression in `x` compiled at runtime.
 */
export type ActivationSource =
  | { kind: "builtin"; name: BuiltinActivationName }
  | { kind: "expression"; expression: string };

export const DEFAULT_ACTIVATION_SOURCES: ChannelTriple<ActivationSource> = [
  { kind: "builtin", name: "soft-gaussian" },
  { kind: "builtin", name: "abs" },
  { kind: "builtin", name: "scaled-abs" },
];

export const DEFAULT_ACTIVATIONS: ChannelTriple<Activation> = [
  BUILTIN_ACTIVATIONS["soft-gaussian"],
  BUILTIN_ACTIVATIONS["abs"],
  BUILTIN_ACTIVATIONS["scaled-abs"],
];

export function isBuiltinActivationName(name: string): name is BuiltinActivationName {
  return (BUILTIN_ACTIVATION_NAMES as readonly string[]).includes(name);
}

/** Runs one nerdamer call, reporting anything it throws as a compile error for `expression`. */
function viaNerdamer<T>(expression: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    throw new ActivationCompileError(expression, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Compiles an expression in the single variable `x` (e.g. "abs(1.2*x)" or
 * "1 - 2^(-0.6*x^2)") into a numeric function.
 *
 * Assignments, definitions and equations (":=", "=") are rejected before
 * nerdamer sees them, since nerdamer would register them globally.
 *
 * Results that aren't numbers come back as NaN; the step's clamp takes it from there.
 */
export function compileExpression(expression: string): Activation {
  const source = expression.trim();
  if (source === "") {
    throw new ActivationCompileError(expression, "expression is empty");
  }
  if (/[:=]/.test(source)) {
    throw new ActivationCompileError(expression, "assignments and equations are not allowed");
  }

  const parsed = viaNerdamer(expression, () => nerdamer(source));
  const variables = viaNerdamer(expression, () => parsed.variables());
  const unknown = variables.filter((v) => v !== "x");
  if (unknown.length > 0) {
    throw new ActivationCompileError(expression, `unknown variable(s) ${unknown.join(", ")}; only x is allowed`);
  }

  const built: unknown = viaNerdamer(expression, () => parsed.buildFunction(["x"]));
  if (typeof built !== "function") {
    throw new ActivationCompileError(expression, "expression did not build into a function");
  }

  return (x: number) => {
    const y: unknown = built(x);
    return typeof y === "number" ? y : NaN;
  };
}

export function compileActivation(source: ActivationSource): Activation {
  switch (source.kind) {
    case "builtin":
      return BUILTIN_ACTIVATIONS[source.name];
    case "expression":
      return compileExpression(source.expression);
  }
}

/** Stable key for caching compiled activations. */
export function activationKey(source: ActivationSource): string {
  return source.kind === "builtin" ? `builtin:${source.name}` : `expression:${source.expression.trim()}`;
}

/**
 * Caches compiled expressions so a snapshot per step doesn't recompile them.
 * Holds at most `maxEntries`; the least recently used entry is dropped first.
 */
export class ActivationCache {
  private readonly compiled = new Map<string, Activation>();

  constructor(private readonly maxEntries = ACTIVATION_CACHE_SIZE) {}

  get(source: ActivationSource): Activation {
    const key = activationKey(source);
    let activation = this.compiled.get(key);
    if (activation) {
      // Map order doubles as recency order
      this.compiled.delete(key);
    } else {
      activation = compileActivation(source);
    }
    this.compiled.set(key, activation);
    while (this.compiled.size > this.maxEntries) {
      const oldest = this.compiled.keys().next();
      if (oldest.done) break;
      this.compiled.delete(oldest.value);
    }
    return activation;
  }

  get size(): number {
    return this.compiled.size;
  }
}
