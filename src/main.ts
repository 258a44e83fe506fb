/**
 * Course analytics command line
 *
 * Usage:
 *   tsx src/main.ts <course-id> <endpoint> [options]
 *   tsx src/main.ts status
 *
 * Options:
 *   --start YYYY-MM-DD     first day to include
 *   --end YYYY-MM-DD       last day to include
 *   --demographic NAME     enrollment breakdown (birth_year, education, gender, location)
 *   --activity-type TYPE   activity category (any, attempted_problem, played_video, posted_forum)
 *   --video ID             video id for video-summary and video-seek-times
 *   --report NAME          report name for reports
 *   --csv                  request CSV instead of JSON
 */

import { pathToFileURL } from "node:url";
import { initAnalyticsApi } from "./api/mod.ts";
import { DataFormat } from "./api/constants.ts";
import { InvalidRequestError } from "./api/errors.ts";
import type { AnalyticsClient } from "./api/client.ts";
import type { CourseResource } from "./api/courses.ts";

export const ENDPOINTS = [
  "enrollment",
  "activity",
  "recent-activity",
  "problems",
  "problems-and-tags",
  "reports",
  "video-settings",
  "video-summary",
  "videos",
  "video-seek-times",
  "on-campus-data",
] as const;

export type Endpoint = (typeof ENDPOINTS)[number];

export interface CommandArgs {
  courseId: string;
  endpoint: Endpoint;
  startDate?: string;
  endDate?: string;
  demographic?: string;
  activityType?: string;
  videoId?: string;
  reportName?: string;
  dataFormat: DataFormat;
}

const VALUE_FLAGS = new Map<string, keyof CommandArgs>([
  ["--start", "startDate"],
  ["--end", "endDate"],
  ["--demographic", "demographic"],
  ["--activity-type", "activityType"],
  ["--video", "videoId"],
  ["--report", "reportName"],
]);

function isEndpoint(value: string): value is Endpoint {
  return (ENDPOINTS as readonly string[]).includes(value);
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: string[]): CommandArgs {
  const positional: string[] = [];
  const values: Partial<Record<keyof CommandArgs, string>> = {};
  let dataFormat: DataFormat = DataFormat.JSON;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--csv") {
      dataFormat = DataFormat.CSV;
      continue;
    }

    const key = VALUE_FLAGS.get(arg);
    if (key) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new InvalidRequestError(`${arg} needs a value.`);
      }
      values[key] = value;
      i++;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new InvalidRequestError(`Unknown option ${arg}.`);
    }

    positional.push(arg);
  }

  const [courseId, endpoint] = positional;
  if (!courseId || !endpoint) {
    throw new InvalidRequestError("Usage: <course-id> <endpoint> [options]");
  }
  if (!isEndpoint(endpoint)) {
    throw new InvalidRequestError(`Unknown endpoint "${endpoint}". Expected one of: ${ENDPOINTS.join(", ")}`);
  }

  return {
    courseId,
    endpoint,
    startDate: values.startDate,
    endDate: values.endDate,
    demographic: values.demographic,
    activityType: values.activityType,
    videoId: values.videoId,
    reportName: values.reportName,
    dataFormat,
  };
}

function requireValue(value: string | undefined, flag: string, endpoint: Endpoint): string {
  if (!value) {
    throw new InvalidRequestError(`${endpoint} requires ${flag}.`);
  }
  return value;
}

/**
 * Call the endpoint named in args
 */
export async function runCommand(course: CourseResource, args: CommandArgs): Promise<unknown> {
  const { dataFormat, startDate, endDate } = args;
  const range = { startDate, endDate, dataFormat };

  switch (args.endpoint) {
    case "enrollment":
      return course.enrollment({ ...range, demographic: args.demographic });
    case "activity":
      return course.activity({ ...range, activityType: args.activityType });
    case "recent-activity":
      return course.recentActivity(args.activityType, { dataFormat });
    case "problems":
      return course.problems({ dataFormat });
    case "problems-and-tags":
      return course.problemsAndTags({ dataFormat });
    case "reports":
      return course.reports(requireValue(args.reportName, "--report", args.endpoint), { dataFormat });
    case "video-settings":
      return course.videoSettings({ dataFormat });
    case "video-summary":
      return course.videoSummary(requireValue(args.videoId, "--video", args.endpoint), range);
    case "videos":
      return course.videos(range);
    case "video-seek-times":
      return course.videoSeekTimes(requireValue(args.videoId, "--video", args.endpoint), range);
    case "on-campus-data":
      return course.onCampusData(range);
  }
}

/**
 * Render a result for stdout: CSV text as-is, JSON pretty-printed
 */
export function formatOutput(result: unknown): string {
  if (typeof result === "string") return result;
  return JSON.stringify(result, null, 2);
}

async function printStatus(client: AnalyticsClient): Promise<void> {
  const [alive, authenticated, healthy] = await Promise.all([
    client.status.alive(),
    client.status.authenticated(),
    client.status.healthy(),
  ]);
  console.log(`Alive:         ${alive}`);
  console.log(`Authenticated: ${authenticated}`);
  console.log(`Healthy:       ${healthy}`);
}

async function main(argv: string[]): Promise<void> {
  const client = initAnalyticsApi();

  if (argv[0] === "status") {
    await printStatus(client);
    return;
  }

  const args = parseArgs(argv);
  const result = await runCommand(client.courses(args.courseId), args);
  console.log(formatOutput(result));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error("Analytics request failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
