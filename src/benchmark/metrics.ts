import { UploadError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";

export type FetchLike = (input: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface MetricReporterOptions {
  dashboardUrl: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Fixed-point decimal text with six fractional digits, never exponent notation.
 */
export function formatMetricValue(value: number): string {
  return value.toLocaleString("en-US", {
    useGrouping: false,
    minimumFractionDigits: 6,
    maximumFractionDigits: 6
  });
}

export function metricUrl(dashboardUrl: string, metricName: string): string {
  return `${dashboardUrl.replace(/\/+$/, "")}/api/metric/${metricName}`;
}

/**
 * Posts single numeric metrics to the dashboard. One attempt per metric.
 */
export class MetricReporter {
  private readonly dashboardUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: MetricReporterOptions) {
    this.dashboardUrl = options.dashboardUrl;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  async report(metricName: string, value: number): Promise<void> {
    const url = metricUrl(this.dashboardUrl, metricName);
    this.logger.debug(`uploading ${metricName}=${value} to ${url}`);

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "text/plain" },
        body: formatMetricValue(value)
      });
    } catch (error) {
      throw new UploadError(url, { cause: error });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new UploadError(url, { status: response.status, cause: error });
    }
    this.logger.debug(`dashboard replied ${response.status}: ${body.trim()}`);

    if (!response.ok) {
      throw new UploadError(url, { status: response.status, cause: body.trim() || undefined });
    }
  }
}
