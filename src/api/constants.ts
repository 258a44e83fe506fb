/**
 * Analytics API constants
 * Tokens are forwarded verbatim; the server decides which ones it accepts.
 */

/** Response encodings the API can negotiate */
export const DataFormat = {
  JSON: "json",
  CSV: "csv",
} as const;

export type DataFormat = (typeof DataFormat)[keyof typeof DataFormat];

/** MIME type sent in the Accept header for each data format */
export const ACCEPT_HEADERS: Record<DataFormat, string> = {
  json: "application/json",
  csv: "text/csv",
};

/** Student activity categories */
export const ActivityType = {
  ANY: "any",
  ATTEMPTED_PROBLEM: "attempted_problem",
  PLAYED_VIDEO: "played_video",
  POSTED_FORUM: "posted_forum",
} as const;

export type ActivityType = (typeof ActivityType)[keyof typeof ActivityType];

/** Enrollment breakdowns */
export const Demographic = {
  BIRTH_YEAR: "birth_year",
  EDUCATION: "education",
  GENDER: "gender",
  LOCATION: "location",
} as const;

export type Demographic = (typeof Demographic)[keyof typeof Demographic];

/** Request timeout used when none is configured (milliseconds) */
export const DEFAULT_TIMEOUT_MS = 250;
