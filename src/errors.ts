/**
 * Error hierarchy for the resolution engine.
 *
 * Apart from `ConfigLoadError`, none of these escape the component that
 * raises them: they are logged where they happen and replaced by an empty
 * or default result.
 */

export class AliasError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AliasError";
  }
}

export class ConfigLoadError extends AliasError {
  constructor(
    public readonly configPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load config "${configPath}": ${message}`, "CONFIG_LOAD_ERROR", options);
    this.name = "ConfigLoadError";
  }
}

export class ConfigReferenceError extends AliasError {
  constructor(
    public readonly sourceName: string,
    public readonly available: readonly string[],
  ) {
    super(`Source "${sourceName}" is not defined`, "CONFIG_REFERENCE_ERROR");
    this.name = "ConfigReferenceError";
  }
}

export class CircularDependencyError extends AliasError {
  constructor(public readonly chain: readonly string[]) {
    super(`Circular reference between dynamic sources: ${chain.join(" -> ")}`, "CIRCULAR_DEPENDENCY");
    this.name = "CircularDependencyError";
  }
}

export type SourceFailureReason = "exit" | "timeout" | "empty" | "json" | "shape" | "spawn";

export class SourceExecutionError extends AliasError {
  constructor(
    public readonly sourceName: string,
    public readonly reason: SourceFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Dynamic source "${sourceName}" failed: ${message}`, "SOURCE_EXECUTION_ERROR", options);
    this.name = "SourceExecutionError";
  }
}

export class CacheCorruptionError extends AliasError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CACHE_CORRUPTION", options);
    this.name = "CacheCorruptionError";
  }
}

export class StrictViolationError extends AliasError {
  constructor(public readonly extraArgs: readonly string[]) {
    super(`Strict mode enabled. Unknown arguments: ${extraArgs.join(" ")}`, "STRICT_VIOLATION");
    this.name = "StrictViolationError";
  }
}

export class SetLocalsViolationError extends AliasError {
  constructor(
    message: string,
    public readonly output: string,
  ) {
    super(message, "SET_LOCALS_VIOLATION");
    this.name = "SetLocalsViolationError";
  }
}

export class PlatformUnsupportedError extends AliasError {
  constructor(
    public readonly platform: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Machine identity unavailable on ${platform}: ${message}`, "PLATFORM_UNSUPPORTED", options);
    this.name = "PlatformUnsupportedError";
  }
}
