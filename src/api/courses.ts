/**
 * Course Analytics API
 * One method per course-level endpoint; all requests go through the injected client.
 */

import { ActivityType, DataFormat } from "./constants.ts";
import { InvalidRequestError } from "./errors.ts";
import type {
  ActivityOptions,
  ActivityRecord,
  DateInput,
  DateRangeOptions,
  EnrollmentOptions,
  EnrollmentRecord,
  FormatOptions,
  FormatResult,
  HttpClient,
  OnCampusStudentRecord,
  Problem,
  ProblemWithTags,
  RecentActivity,
  Report,
  Video,
  VideoSeekTime,
  VideoSettings,
  VideoSummary,
} from "./types.ts";

/**
 * Format a date filter as YYYY-MM-DD (UTC)
 */
export function formatDate(date: DateInput): string {
  if (typeof date === "string") return date;
  if (Number.isNaN(date.getTime())) {
    throw new InvalidRequestError("Invalid date filter.");
  }
  return date.toISOString().split("T")[0];
}

/**
 * Append a query string to a path, or return it bare when there are no params
 */
export function withQuery(path: string, params: URLSearchParams): string {
  const query = params.toString();
  return query ? `${path}?${query}` : path;
}

function dateParams(params: URLSearchParams, options: DateRangeOptions<DataFormat>): URLSearchParams {
  if (options.startDate) {
    params.append("start_date", formatDate(options.startDate));
  }
  if (options.endDate) {
    params.append("end_date", formatDate(options.endDate));
  }
  return params;
}

/** Percent-encode each segment of a course id, keeping its "/" separators */
function encodeCourseId(courseId: string): string {
  return courseId.split("/").map(encodeURIComponent).join("/");
}

export class CourseResource {
  readonly courseId: string;
  private readonly client: HttpClient;
  private readonly basePath: string;

  /**
   * @param client - shared HTTP client; not owned by the resource
   * @param courseId - e.g. "edX/DemoX/Demo_Course"
   */
  constructor(client: HttpClient, courseId: string) {
    if (!courseId) {
      throw new InvalidRequestError("course_id cannot be empty.");
    }
    this.client = client;
    this.courseId = courseId;
    this.basePath = `courses/${encodeCourseId(courseId)}`;
  }

  private request<T, F extends DataFormat>(path: string, dataFormat: F | undefined): Promise<FormatResult<F, T>> {
    return this.client.get<FormatResult<F, T>>(path, dataFormat ?? DataFormat.JSON);
  }

  /**
   * Get course enrollment data
   *
   * Without a date range the server returns the most recent day only.
   * A demographic groups the counts by that dimension.
   */
  async enrollment<F extends DataFormat = "json">(
    options: EnrollmentOptions<F> = {}
  ): Promise<FormatResult<F, EnrollmentRecord[]>> {
    let path = `${this.basePath}/enrollment/`;
    if (options.demographic) {
      path += `${encodeURIComponent(options.demographic)}/`;
    }

    const params = dateParams(new URLSearchParams(), options);
    return this.request<EnrollmentRecord[], F>(withQuery(path, params), options.dataFormat);
  }

  /**
   * Get weekly student activity
   *
   * activity_type is always sent, even when it is the default.
   */
  async activity<F extends DataFormat = "json">(
    options: ActivityOptions<F> = {}
  ): Promise<FormatResult<F, ActivityRecord[]>> {
    const activityType = options.activityType === undefined ? ActivityType.ANY : options.activityType;
    if (!activityType) {
      throw new InvalidRequestError("activity_type cannot be empty.");
    }

    const params = new URLSearchParams({ activity_type: activityType });
    dateParams(params, options);

    return this.request<ActivityRecord[], F>(withQuery(`${this.basePath}/activity/`, params), options.dataFormat);
  }

  /**
   * Get the activity count for the most recent week
   * @deprecated Use activity() instead.
   */
  async recentActivity<F extends DataFormat = "json">(
    activityType: string = ActivityType.ANY,
    options: FormatOptions<F> = {}
  ): Promise<FormatResult<F, RecentActivity>> {
    console.warn("recentActivity has been deprecated! Use activity instead.");

    const params = new URLSearchParams({ activity_type: activityType });
    return this.request<RecentActivity, F>(
      withQuery(`${this.basePath}/recent_activity/`, params),
      options.dataFormat
    );
  }

  /**
   * Get the problems for the course
   */
  async problems<F extends DataFormat = "json">(options: FormatOptions<F> = {}): Promise<FormatResult<F, Problem[]>> {
    return this.request<Problem[], F>(`${this.basePath}/problems/`, options.dataFormat);
  }

  /**
   * Get the problems for the course along with their tags
   */
  async problemsAndTags<F extends DataFormat = "json">(
    options: FormatOptions<F> = {}
  ): Promise<FormatResult<F, ProblemWithTags[]>> {
    return this.request<ProblemWithTags[], F>(`${this.basePath}/problems_and_tags/`, options.dataFormat);
  }

  /**
   * Get download details for a generated course report (e.g. "problem_response")
   */
  async reports<F extends DataFormat = "json">(
    reportName: string,
    options: FormatOptions<F> = {}
  ): Promise<FormatResult<F, Report>> {
    return this.request<Report, F>(
      `${this.basePath}/reports/${encodeURIComponent(reportName)}/`,
      options.dataFormat
    );
  }

  /**
   * Get the settings the pipeline used to process video logs
   */
  async videoSettings<F extends DataFormat = "json">(
    options: FormatOptions<F> = {}
  ): Promise<FormatResult<F, VideoSettings>> {
    return this.request<VideoSettings, F>(`${this.basePath}/videos/settings/`, options.dataFormat);
  }

  /**
   * Summary information about a particular video
   */
  async videoSummary<F extends DataFormat = "json">(
    videoId: string,
    options: DateRangeOptions<F> = {}
  ): Promise<FormatResult<F, VideoSummary>> {
    const path = `${this.basePath}/videos/${encodeURIComponent(videoId)}/summary/`;
    const params = dateParams(new URLSearchParams(), options);
    return this.request<VideoSummary, F>(withQuery(path, params), options.dataFormat);
  }

  /**
   * Get tracked videos for the course
   */
  async videos<F extends DataFormat = "json">(options: DateRangeOptions<F> = {}): Promise<FormatResult<F, Video[]>> {
    const params = dateParams(new URLSearchParams(), options);
    return this.request<Video[], F>(withQuery(`${this.basePath}/videos/`, params), options.dataFormat);
  }

  /**
   * Get seek times for a video
   */
  async videoSeekTimes<F extends DataFormat = "json">(
    videoId: string,
    options: DateRangeOptions<F> = {}
  ): Promise<FormatResult<F, VideoSeekTime[]>> {
    const path = `${this.basePath}/videos/${encodeURIComponent(videoId)}/seek_times/`;
    const params = dateParams(new URLSearchParams(), options);
    return this.request<VideoSeekTime[], F>(withQuery(path, params), options.dataFormat);
  }

  /**
   * Get per-student data for on-campus learners
   */
  async onCampusData<F extends DataFormat = "json">(
    options: DateRangeOptions<F> = {}
  ): Promise<FormatResult<F, OnCampusStudentRecord[]>> {
    const params = dateParams(new URLSearchParams(), options);
    return this.request<OnCampusStudentRecord[], F>(
      withQuery(`${this.basePath}/on_campus_student_data/`, params),
      options.dataFormat
    );
  }
}
