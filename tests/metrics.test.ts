import { describe, expect, it } from "vitest";
import { formatMetricValue, MetricReporter, metricUrl, type FetchLike } from "../src/benchmark/metrics.js";
import { UploadError } from "../src/core/errors.js";

interface PostedMetric {
  url: string;
  method: string;
  body: string;
}

function recordingFetch(posted: PostedMetric[], status = 200, reply = "ok"): FetchLike {
  return async (input, init) => {
    posted.push({ url: input, method: init.method, body: init.body });
    return { ok: status >= 200 && status < 300, status, text: async () => reply };
  };
}

describe("metric reporter", () => {
  it("builds the metric endpoint without doubled slashes", () => {
    expect(metricUrl("https://dashboard.example.test/", "semgrep.bench.c1.v1.duration")).toBe(
      "https://dashboard.example.test/api/metric/semgrep.bench.c1.v1.duration"
    );
  });

  it("renders values as fixed-point decimals at any magnitude", () => {
    expect(formatMetricValue(2.5)).toBe("2.500000");
    expect(formatMetricValue(1e-7)).toBe("0.000000");
    expect(formatMetricValue(1e21)).toBe("1000000000000000000000.000000");
    expect(formatMetricValue(3723.1234567)).toBe("3723.123457");
  });

  it("posts the value as plain decimal text", async () => {
    const posted: PostedMetric[] = [];
    const reporter = new MetricReporter({
      dashboardUrl: "https://dashboard.example.test",
      fetchImpl: recordingFetch(posted)
    });

    await reporter.report("semgrep.bench.c1.v1.duration", 2.5);

    expect(posted).toEqual([
      {
        url: "https://dashboard.example.test/api/metric/semgrep.bench.c1.v1.duration",
        method: "POST",
        body: "2.500000"
      }
    ]);
  });

  it("raises an upload error on network failure", async () => {
    const reporter = new MetricReporter({
      dashboardUrl: "https://dashboard.example.test",
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      }
    });

    const error = await reporter.report("m", 1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UploadError);
    expect(error instanceof UploadError ? error.message : "").toBe(
      "Metric upload to https://dashboard.example.test/api/metric/m request failed"
    );
  });

  it("raises an upload error on a non-2xx response", async () => {
    const reporter = new MetricReporter({
      dashboardUrl: "https://dashboard.example.test",
      fetchImpl: recordingFetch([], 503, "unavailable")
    });

    const error = await reporter.report("m", 1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UploadError);
    expect(error instanceof UploadError ? error.status : undefined).toBe(503);
  });
});
