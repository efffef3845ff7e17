/**
 * Time conversion and projection window utilities.
 * Dates of birth are the only true date inputs; everything else is an absolute year.
 * There is no partial-year counting: a person "is" age N for the whole calendar year
 * in which they reach N.
 */

import { Household, PersonSlot, getPerson } from "../models/Household";
import { Plan, getFinalAge, getRetirementAge } from "../models/Plan";
import { ProjectionWindow } from "../models/ProjectionResult";
import { IncompleteEntityError, InvalidWindowError } from "./errors";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Extracts the birth year from an ISO date of birth.
 *
 * @param dateOfBirth - ISO date, e.g. "1970-06-15"
 * @returns The four-digit birth year
 * @throws IncompleteEntityError when the date is malformed
 */
export function birthYearOf(dateOfBirth: string): number {
  const match = ISO_DATE.exec(dateOfBirth);
  if (!match) {
    throw new IncompleteEntityError("person", null, "dateOfBirth", `is not an ISO date: "${dateOfBirth}"`);
  }
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    throw new IncompleteEntityError("person", null, "dateOfBirth", `is not a valid date: "${dateOfBirth}"`);
  }
  return Number(match[1]);
}

/**
 * Converts an age to the calendar year in which the person reaches it.
 *
 * @example
 * ```ts
 * yearForAge("1970-01-01", 65) // 2035
 * ```
 */
export function yearForAge(dateOfBirth: string, age: number): number {
  return birthYearOf(dateOfBirth) + age;
}

/**
 * Converts a calendar year to the age the person reaches during it.
 *
 * @example
 * ```ts
 * ageForYear("1970-01-01", 2025) // 55
 * ```
 */
export function ageForYear(dateOfBirth: string, year: number): number {
  return year - birthYearOf(dateOfBirth);
}

/**
 * Converts an age to a year using a window's recorded birth years.
 *
 * @throws IncompleteEntityError when the person has no date of birth
 */
export function yearForAgeInWindow(window: ProjectionWindow, slot: PersonSlot, age: number): number {
  const birthYear = slot === 1 ? window.birthYears.person1 : window.birthYears.person2;
  if (birthYear === null) {
    throw new IncompleteEntityError(`person${slot}`, null, "dateOfBirth", "is required for age-based timing");
  }
  return birthYear + age;
}

/**
 * Checks that start < retirement < end.
 *
 * @throws InvalidWindowError when the ordering is violated
 */
export function validateTimeline(startYear: number, retirementYear: number, endYear: number): void {
  if (!(startYear < retirementYear && retirementYear < endYear)) {
    throw new InvalidWindowError(startYear, retirementYear, endYear);
  }
}

/**
 * Establishes the fixed projection window for a plan.
 * The start year is the plan's frozen creation year; it is never derived from a clock.
 *
 * @param household - Household holding the persons' dates of birth
 * @param plan - Plan with reference person and base assumptions
 * @param retirementAges - Scenario retirement ages; absent fields fall back to the plan's
 * @throws InvalidWindowError when retirement or end year ordering is violated
 * @throws IncompleteEntityError when a required person or age is missing
 */
export function projectionWindow(
  household: Household,
  plan: Plan,
  retirementAges: { retirementAge1?: number | null; retirementAge2?: number | null } = {}
): ProjectionWindow {
  const assumptions = plan.baseFacts.assumptions;
  const birthYears = {
    person1: household.person1 ? birthYearOf(household.person1.dateOfBirth) : null,
    person2: household.person2 ? birthYearOf(household.person2.dateOfBirth) : null,
  };

  const referencePerson = plan.referencePerson;
  const reference = getPerson(household, referencePerson);
  if (!reference) {
    throw new IncompleteEntityError("plan", plan.planId, "referencePerson", `names person${referencePerson}, who is not in the household`);
  }

  const effectiveAges = {
    retirementAge1: retirementAges.retirementAge1 ?? assumptions.retirementAge1,
    retirementAge2: retirementAges.retirementAge2 ?? assumptions.retirementAge2,
  };
  const retirementAge = getRetirementAge(effectiveAges, referencePerson);
  if (retirementAge === null) {
    throw new IncompleteEntityError("plan", plan.planId, `retirementAge${referencePerson}`, "is required for the reference person");
  }

  const finalSlot = assumptions.finalAgeSelector;
  const finalPerson = getPerson(household, finalSlot);
  if (!finalPerson) {
    throw new IncompleteEntityError("plan", plan.planId, "finalAgeSelector", `names person${finalSlot}, who is not in the household`);
  }
  const finalAge = getFinalAge(assumptions, finalSlot);
  if (finalAge === null) {
    throw new IncompleteEntityError("plan", plan.planId, `finalAge${finalSlot}`, "is required for the selected person");
  }

  const startYear = plan.planCreationYear;
  const retirementYear = yearForAge(reference.dateOfBirth, retirementAge);
  const endYear = yearForAge(finalPerson.dateOfBirth, finalAge);
  validateTimeline(startYear, retirementYear, endYear);

  return { startYear, retirementYear, endYear, referencePerson, birthYears };
}

/**
 * Lists every year of the window, inclusive.
 */
export function projectionYears(window: ProjectionWindow): number[] {
  const years: number[] = [];
  for (let year = window.startYear; year <= window.endYear; year++) {
    years.push(year);
  }
  return years;
}

/**
 * Checks if a year falls inside the projection window.
 */
export function isYearInWindow(year: number, window: ProjectionWindow): boolean {
  return year >= window.startYear && year <= window.endYear;
}

/**
 * Checks if a [start, end] span is active in a year. A null end is open-ended.
 */
export function isActiveInYear(year: number, startYear: number, endYear: number | null): boolean {
  return startYear <= year && (endYear === null || year <= endYear);
}
