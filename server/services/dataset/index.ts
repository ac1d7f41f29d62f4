/**
 * Dataset Module - loading an employee record set from an upload or the
 * synthetic generator.
 */

export {
  parseEmployeeCsv,
  detectDelimiter,
  DatasetLoadError,
  type ParseEmployeeCsvOptions,
} from "./csvLoader";

export { parseHiringDate, formatHiringDate, HIRING_DATE_FORMATS } from "./hiringDate";

export {
  generateSampleRecords,
  generateSampleDataset,
  mulberry32,
  SAMPLE_DEFAULTS,
  SAMPLE_DEPARTMENTS,
  SAMPLE_GENDERS,
  SAMPLE_RANGES,
  type SampleDataOptions,
  type RandomSource,
} from "./sampleGenerator";
