/**
 * Course Analytics API Type Definitions
 * Records as returned by the JSON format; servers may add fields.
 */

import type { DataFormat } from "./constants.ts";

/** Minimal contract a resource needs from the HTTP layer */
export interface HttpClient {
  get<T>(path: string, dataFormat?: DataFormat): Promise<T>;
}

/** CSV responses are returned as raw text, JSON responses as records */
export type FormatResult<F extends DataFormat, T> = F extends "csv" ? string : T;

/** A date filter: "YYYY-MM-DD" or a Date (formatted as its UTC day) */
export type DateInput = string | Date;

export interface DateRangeOptions<F extends DataFormat = "json"> {
  startDate?: DateInput | null;
  endDate?: DateInput | null;
  dataFormat?: F;
}

export interface EnrollmentOptions<F extends DataFormat = "json"> extends DateRangeOptions<F> {
  /** Group results by this demographic (see Demographic) */
  demographic?: string | null;
}

export interface ActivityOptions<F extends DataFormat = "json"> extends DateRangeOptions<F> {
  /** Defaults to ActivityType.ANY; null or "" is rejected */
  activityType?: string | null;
}

export interface FormatOptions<F extends DataFormat = "json"> {
  dataFormat?: F;
}

/** Enrollment count for one day, optionally split by a demographic value */
export interface EnrollmentRecord {
  course_id: string;
  date: string;
  count: number;
  created: string;
  birth_year?: number | null;
  education_level?: string | null;
  gender?: string | null;
  country?: {
    alpha2: string | null;
    alpha3: string | null;
    name: string;
  };
  cumulative_count?: number;
}

/** Weekly activity counts */
export interface ActivityRecord {
  course_id: string;
  interval_start: string;
  interval_end: string;
  any?: number;
  attempted_problem?: number;
  played_video?: number;
  posted_forum?: number;
  created?: string;
}

export interface RecentActivity {
  course_id: string;
  interval_start: string;
  interval_end: string;
  activity_type: string;
  count: number;
}

export interface Problem {
  module_id: string;
  total_submissions?: number;
  correct_submissions?: number;
  part_ids?: string[];
  created?: string;
}

export interface ProblemWithTags extends Problem {
  tags?: Record<string, string | string[]>;
}

export interface Report {
  course_id: string;
  report_name: string;
  download_url: string;
  last_modified: string;
  expiration_date: string;
  file_size: number;
}

export interface VideoSettings {
  pipeline_video_id?: string;
  [setting: string]: unknown;
}

export interface Video {
  pipeline_video_id: string;
  encoded_module_id: string;
  duration: number;
  segment_length: number;
  users_at_start?: number;
  users_at_end?: number;
  start_views?: number;
  end_views?: number;
  created: string;
}

export interface VideoSummary {
  pipeline_video_id: string;
  [field: string]: unknown;
}

export interface VideoSeekTime {
  pipeline_video_id?: string;
  seek_interval?: number;
  num_seeks?: number;
  [field: string]: unknown;
}

export interface OnCampusStudentRecord {
  course_id: string;
  [field: string]: unknown;
}

/** Body of the health/ endpoint */
export interface HealthStatus {
  overall_status: string;
  detailed_status?: Record<string, string>;
}
