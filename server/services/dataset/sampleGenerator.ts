/**
 * Sample Data Generator - synthetic employee dataset
 *
 * Deterministic: same seed => same records (mulberry32 PRNG).
 * Ranges are half-open [min, max).
 */

import { addDays } from "date-fns";
import {
  ATTRITION_NO,
  ATTRITION_YES,
  type EmployeeRecord,
  type LoadedDataset,
} from "@shared/employee";

// ============================================================================
// Constants
// ============================================================================

export const SAMPLE_DEFAULTS = {
  rows: 200,
  seed: 42,
  attritionProbability: 0.15,
} as const;

export const SAMPLE_DEPARTMENTS = [
  "Sales",
  "Marketing",
  "Engineering",
  "Human Resources",
  "Finance",
] as const;

export const SAMPLE_GENDERS = ["Male", "Female"] as const;

export const SAMPLE_RANGES = {
  age: { min: 22, max: 60 },
  salary: { min: 40_000, max: 150_000 },
  yearsAtCompany: { min: 1, max: 15 },
  performanceRating: { min: 1, max: 5 },
  /** days after HIRING_EPOCH */
  hiringOffsetDays: { min: 0, max: 1825 },
} as const;

const HIRING_EPOCH = new Date(2020, 0, 1);

// ============================================================================
// PRNG
// ============================================================================

export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: RandomSource, range: { min: number; max: number }): number {
  return range.min + Math.floor(random() * (range.max - range.min));
}

function pick<T>(random: RandomSource, values: readonly T[]): T {
  return values[Math.floor(random() * values.length)];
}

// ============================================================================
// Generator
// ============================================================================

export interface SampleDataOptions {
  rows?: number;
  seed?: number;
  attritionProbability?: number;
}

export function generateSampleRecords(options: SampleDataOptions = {}): EmployeeRecord[] {
  const rows = options.rows ?? SAMPLE_DEFAULTS.rows;
  const seed = options.seed ?? SAMPLE_DEFAULTS.seed;
  const attritionProbability = options.attritionProbability ?? SAMPLE_DEFAULTS.attritionProbability;

  if (!Number.isInteger(rows) || rows < 1) {
    throw new RangeError(`rows must be a positive integer, got ${rows}`);
  }

  const random = mulberry32(seed);
  const records: EmployeeRecord[] = [];

  for (let i = 1; i <= rows; i++) {
    records.push({
      employeeId: i,
      department: pick(random, SAMPLE_DEPARTMENTS),
      age: randomInt(random, SAMPLE_RANGES.age),
      gender: pick(random, SAMPLE_GENDERS),
      attrition: random() < attritionProbability ? ATTRITION_YES : ATTRITION_NO,
      salary: randomInt(random, SAMPLE_RANGES.salary),
      yearsAtCompany: randomInt(random, SAMPLE_RANGES.yearsAtCompany),
      performanceRating: randomInt(random, SAMPLE_RANGES.performanceRating),
      hiringDate: addDays(HIRING_EPOCH, randomInt(random, SAMPLE_RANGES.hiringOffsetDays)),
    });
  }

  return records;
}

/**
 * Wraps generated records as a loadable dataset.
 */
export function generateSampleDataset(
  options: SampleDataOptions = {},
  loadedAt: Date = new Date()
): LoadedDataset {
  return {
    source: "sample",
    fileName: null,
    loadedAt,
    records: generateSampleRecords(options),
    missingHiringDates: 0,
  };
}
