import { z } from "zod";
import { InvalidDistanceError } from "../../star_atlas/errors.js";

/**
 * Length units accepted for the "maximum distance" input.
 * Pure functions only; every result is in parsecs.
 */

const METERS_PER_PARSEC = 3.0856775814913673e16;
const METERS_PER_LIGHT_YEAR = 9.4607304725808e15;
const METERS_PER_AU = 1.495978707e11;

export type LengthUnit = "pc" | "kpc" | "Mpc" | "ly" | "au" | "km" | "m";

const PARSECS_PER_UNIT: Record<LengthUnit, number> = {
  pc: 1,
  kpc: 1e3,
  Mpc: 1e6,
  ly: METERS_PER_LIGHT_YEAR / METERS_PER_PARSEC,
  au: METERS_PER_AU / METERS_PER_PARSEC,
  km: 1e3 / METERS_PER_PARSEC,
  m: 1 / METERS_PER_PARSEC,
};

const UNIT_ALIASES: Record<string, LengthUnit> = {
  pc: "pc",
  parsec: "pc",
  parsecs: "pc",
  kpc: "kpc",
  kiloparsec: "kpc",
  kiloparsecs: "kpc",
  mpc: "Mpc",
  megaparsec: "Mpc",
  megaparsecs: "Mpc",
  ly: "ly",
  lyr: "ly",
  lightyear: "ly",
  lightyears: "ly",
  "light-year": "ly",
  "light-years": "ly",
  au: "au",
  km: "km",
  kilometer: "km",
  kilometers: "km",
  kilometre: "km",
  kilometres: "km",
  m: "m",
  meter: "m",
  meters: "m",
  metre: "m",
  metres: "m",
};

function isLengthUnit(unit: string): unit is LengthUnit {
  return Object.hasOwn(PARSECS_PER_UNIT, unit);
}

export function resolveUnit(unit: string): LengthUnit | null {
  const trimmed = unit.trim();
  if (isLengthUnit(trimmed)) return trimmed;
  const lower = trimmed.toLowerCase();
  return Object.hasOwn(UNIT_ALIASES, lower) ? UNIT_ALIASES[lower] : null;
}

/**
 * Convert a positive length to parsecs.
 *
 * Throws InvalidDistanceError for non-finite or non-positive values and for
 * units outside the table above.
 */
export function toParsecs(value: number, unit: string): number {
  const resolved = resolveUnit(unit);
  if (!resolved) {
    throw new InvalidDistanceError(`${value} ${unit}`, `unknown unit "${unit}"`);
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidDistanceError(`${value} ${unit}`, "distance must be a positive number");
  }
  const parsecs = value * PARSECS_PER_UNIT[resolved];
  // Extreme exponents under- or overflow once scaled.
  if (!Number.isFinite(parsecs) || parsecs <= 0) {
    throw new InvalidDistanceError(`${value} ${unit}`, "distance is outside the representable range");
  }
  return parsecs;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const DistanceTextSchema = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, "not a number")
  .transform((s) => Number(s));

export interface DistanceInput {
  value: number;
  unit: LengthUnit;
  parsecs: number;
}

/**
 * Validate raw user text ("50", " 12.5 ") into a distance.
 * This is the only way user input reaches the query builder.
 */
export function parseDistanceInput(raw: string, unit: string): DistanceInput {
  const parsed = DistanceTextSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidDistanceError(raw, parsed.error.issues[0]?.message ?? "not a number");
  }

  const resolved = resolveUnit(unit);
  if (!resolved) {
    throw new InvalidDistanceError(raw, `unknown unit "${unit}"`);
  }
  if (!Number.isFinite(parsed.data) || parsed.data <= 0) {
    throw new InvalidDistanceError(raw, "distance must be a positive number");
  }

  return {
    value: parsed.data,
    unit: resolved,
    parsecs: toParsecs(parsed.data, resolved),
  };
}

export function formatDistance(value: number, unit: LengthUnit): string {
  return `${value.toFixed(2)} ${unit}`;
}
