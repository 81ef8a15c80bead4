import type {
  Diagnostics,
  ReconstructionIssue,
} from "./types/geometry.js";

export interface IssueContext {
  roomId?: string | null;
  wallId?: string | null;
  elementId?: string | null;
  suggestion?: string | null;
}

/**
 * Base class for every failure the converter knows about. `code` is the
 * stable identifier reported in diagnostics.
 */
export class ReconstructionError extends Error {
  readonly code: string;
  readonly context: IssueContext;

  constructor(code: string, message: string, context: IssueContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toIssue(): ReconstructionIssue {
    return {
      code: this.code,
      severity: "error",
      message: this.message,
      roomId: this.context.roomId ?? null,
      wallId: this.context.wallId ?? null,
      elementId: this.context.elementId ?? null,
      suggestion: this.context.suggestion ?? null,
    };
  }
}

/** Invalid configuration. Fatal; raised before any geometry work. */
export class ConfigError extends ReconstructionError {
  constructor(message: string, context?: IssueContext) {
    super("config-error", message, context);
  }
}

/** Structurally invalid detector input. Fatal for the floorplan. */
export class GeometryError extends ReconstructionError {
  constructor(message: string, context?: IssueContext) {
    super("geometry-error", message, context);
  }
}

/** A face trace that did not close, or closed into an invalid polygon. */
export class TopologyError extends ReconstructionError {
  constructor(message: string, context?: IssueContext) {
    super("topology-error", message, context);
  }
}

/** An opening icon with no wall inside the match tolerance. */
export class UnmatchedOpeningError extends ReconstructionError {
  constructor(message: string, context?: IssueContext) {
    super("unmatched-opening", message, context);
  }
}

/** An opening whose host wall bounds no room. */
export class UnattachedWallError extends ReconstructionError {
  constructor(message: string, context?: IssueContext) {
    super("unattached-wall", message, context);
  }
}

/**
 * Accumulates non-fatal errors and warnings over one conversion.
 */
export class IssueCollector {
  private errors: ReconstructionIssue[] = [];
  private warnings: ReconstructionIssue[] = [];

  record(error: ReconstructionError): void {
    this.errors.push(error.toIssue());
  }

  warn(code: string, message: string, context: IssueContext = {}): void {
    this.warnings.push({
      code,
      severity: "warning",
      message,
      roomId: context.roomId ?? null,
      wallId: context.wallId ?? null,
      elementId: context.elementId ?? null,
      suggestion: context.suggestion ?? null,
    });
  }

  get errorCount(): number {
    return this.errors.length;
  }

  toDiagnostics(): Diagnostics {
    return { errors: [...this.errors], warnings: [...this.warnings] };
  }
}
