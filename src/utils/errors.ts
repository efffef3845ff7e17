import { EntityKind } from "../models/Scenario";

/**
 * Error taxonomy for the projection engine.
 * Every fault is a caller contract violation; nothing here is retryable.
 */

export type ProjectionErrorCode =
  | "INVALID_WINDOW"
  | "OVERLAPPING_INTERVALS"
  | "DANGLING_OVERRIDE_REFERENCE"
  | "UNKNOWN_OVERRIDE_FIELD"
  | "INVALID_OVERRIDE_VALUE"
  | "INCOMPLETE_ENTITY";

export type ErrorContext = Record<string, string | number | boolean | null>;

export class ProjectionError extends Error {
  public readonly code: ProjectionErrorCode;
  public readonly context: ErrorContext;

  constructor(code: ProjectionErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = "ProjectionError";
    this.code = code;
    this.context = context;
  }
}

export class InvalidWindowError extends ProjectionError {
  constructor(startYear: number, retirementYear: number, endYear: number) {
    super(
      "INVALID_WINDOW",
      `Projection window must satisfy start < retirement < end (got ${startYear} / ${retirementYear} / ${endYear})`,
      { startYear, retirementYear, endYear }
    );
    this.name = "InvalidWindowError";
  }
}

export class OverlappingIntervalsError extends ProjectionError {
  constructor(message: string, context: ErrorContext = {}) {
    super("OVERLAPPING_INTERVALS", message, context);
    this.name = "OverlappingIntervalsError";
  }
}

export class DanglingOverrideReferenceError extends ProjectionError {
  constructor(entity: EntityKind, id: number, overrideIndex: number) {
    super(
      "DANGLING_OVERRIDE_REFERENCE",
      `Override #${overrideIndex} targets ${entity} ${id}, which does not exist in base facts`,
      { entity, id, overrideIndex }
    );
    this.name = "DanglingOverrideReferenceError";
  }
}

export class UnknownOverrideFieldError extends ProjectionError {
  constructor(entity: EntityKind, field: string, overrideIndex: number) {
    super(
      "UNKNOWN_OVERRIDE_FIELD",
      `Override #${overrideIndex} names unknown ${entity} field "${field}"`,
      { entity, field, overrideIndex }
    );
    this.name = "UnknownOverrideFieldError";
  }
}

export class InvalidOverrideValueError extends ProjectionError {
  constructor(entity: EntityKind, field: string, value: string, overrideIndex: number) {
    super(
      "INVALID_OVERRIDE_VALUE",
      `Override #${overrideIndex} value "${value}" is not valid for ${entity} field "${field}"`,
      { entity, field, value, overrideIndex }
    );
    this.name = "InvalidOverrideValueError";
  }
}

export class IncompleteEntityError extends ProjectionError {
  constructor(entity: string, id: number | null, field: string, detail: string) {
    super(
      "INCOMPLETE_ENTITY",
      `${entity}${id === null ? "" : ` ${id}`}: field "${field}" ${detail}`,
      { entity, id, field }
    );
    this.name = "IncompleteEntityError";
  }
}

export function isProjectionError(error: unknown): error is ProjectionError {
  return error instanceof ProjectionError;
}
