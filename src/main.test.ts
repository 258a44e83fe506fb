import { describe, expect, it, vi } from "vitest";
import { formatOutput, parseArgs, runCommand } from "./main.ts";
import { CourseResource } from "./api/courses.ts";
import { InvalidRequestError } from "./api/errors.ts";
import type { HttpClient } from "./api/types.ts";

function fakeCourse() {
  const get = vi.fn().mockResolvedValue([]);
  const client: HttpClient = { get };
  return { course: new CourseResource(client, "edX/DemoX/Demo_Course"), get };
}

describe("parseArgs", () => {
  it("reads the course, endpoint and filters", () => {
    expect(parseArgs(["edX/DemoX/Demo_Course", "enrollment", "--demographic", "gender", "--start", "2014-01-01", "--csv"])).toEqual({
      courseId: "edX/DemoX/Demo_Course",
      endpoint: "enrollment",
      startDate: "2014-01-01",
      endDate: undefined,
      demographic: "gender",
      activityType: undefined,
      videoId: undefined,
      reportName: undefined,
      dataFormat: "csv",
    });
  });

  it("defaults to JSON", () => {
    expect(parseArgs(["c", "videos"]).dataFormat).toBe("json");
  });

  it("rejects unknown endpoints", () => {
    expect(() => parseArgs(["c", "grades"])).toThrow(/Unknown endpoint "grades"/);
  });

  it("rejects a flag without a value", () => {
    expect(() => parseArgs(["c", "videos", "--start"])).toThrow("--start needs a value.");
  });

  it("rejects unknown flags", () => {
    expect(() => parseArgs(["c", "videos", "--verbose"])).toThrow("Unknown option --verbose.");
  });

  it("treats inherited object keys as positional arguments", () => {
    const args = parseArgs(["constructor", "videos", "toString"]);

    expect(args.courseId).toBe("constructor");
    expect(args.endpoint).toBe("videos");
    expect(args.startDate).toBeUndefined();
  });

  it("requires a course and endpoint", () => {
    expect(() => parseArgs(["c"])).toThrow(InvalidRequestError);
  });
});

describe("runCommand", () => {
  it("calls the matching course endpoint", async () => {
    const { course, get } = fakeCourse();

    await runCommand(course, parseArgs(["edX/DemoX/Demo_Course", "video-seek-times", "--video", "0fac49ba", "--end", "2014-01-01"]));

    expect(get).toHaveBeenCalledWith(
      "courses/edX/DemoX/Demo_Course/videos/0fac49ba/seek_times/?end_date=2014-01-01",
      "json"
    );
  });

  it("passes the activity type to activity", async () => {
    const { course, get } = fakeCourse();

    await runCommand(course, parseArgs(["edX/DemoX/Demo_Course", "activity", "--activity-type", "posted_forum"]));

    expect(get).toHaveBeenCalledWith("courses/edX/DemoX/Demo_Course/activity/?activity_type=posted_forum", "json");
  });

  it("requires a report name for reports", async () => {
    const { course, get } = fakeCourse();

    await expect(runCommand(course, parseArgs(["edX/DemoX/Demo_Course", "reports"]))).rejects.toThrow(
      "reports requires --report."
    );
    expect(get).not.toHaveBeenCalled();
  });
});

describe("formatOutput", () => {
  it("prints CSV text unchanged", () => {
    expect(formatOutput("a,b\n1,2")).toBe("a,b\n1,2");
  });

  it("pretty-prints JSON", () => {
    expect(formatOutput({ count: 1 })).toBe('{\n  "count": 1\n}');
  });
});
