import { loadConfig, type AppConfig } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/log";
import { systemClock, type Clock } from "./clock";
import { RateLimiter } from "./rate-limit";
import { AttemptError, RetryPolicy, type RetryOptions } from "./retry";
import { StatsPayloadSchema, type ResultSet } from "./result-set";

export type Transport = (url: string, init: RequestInit) => Promise<Response>;

export type StatsClientOptions = {
  config?: AppConfig;
  baseUrl?: string;
  timeoutMs?: number;
  minIntervalMs?: number;
  retry?: Partial<RetryOptions>;
  transport?: Transport;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

export type QueryParams = Record<string, string | number | null | undefined>;

// stats.nba.com drops requests that do not look like they came from the site
const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "en-US,en;q=0.9",
  Origin: "https://www.nba.com",
  Referer: "https://www.nba.com/",
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "x-nba-stats-origin": "stats",
  "x-nba-stats-token": "true",
};

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class StatsClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly transport: Transport;
  private readonly log: Logger;

  constructor(opts: StatsClientOptions = {}) {
    const cfg = opts.config ?? loadConfig();
    const clock = opts.clock ?? systemClock;
    const delayMs = opts.minIntervalMs ?? cfg.delayMs;

    this.baseUrl = (opts.baseUrl ?? cfg.statsBaseUrl).replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? cfg.timeoutMs;
    this.limiter = new RateLimiter(delayMs, clock);
    this.retry = new RetryPolicy(
      {
        ...opts.retry,
        maxAttempts: opts.retry?.maxAttempts ?? cfg.maxAttempts,
        baseDelayMs: opts.retry?.baseDelayMs ?? delayMs,
      },
      { clock, random: opts.random }
    );
    this.transport = opts.transport ?? ((url, init) => fetch(url, init));
    this.log = opts.logger ?? createLogger("stats", cfg.logLevel);
  }

  buildUrl(endpoint: string, params: QueryParams): string {
    const qs = new URLSearchParams();
    for (const [k, v] of Object.entries(params)) qs.set(k, v === null || v === undefined ? "" : String(v));
    return `${this.baseUrl}/${endpoint}?${qs.toString()}`;
  }

  async get(endpoint: string, params: QueryParams): Promise<ResultSet[]> {
    const url = this.buildUrl(endpoint, params);
    return this.retry.run(
      async () => {
        await this.limiter.acquire();
        this.log.debug(`GET ${url}`);
        return this.attempt(url);
      },
      { label: endpoint, logger: this.log }
    );
  }

  private async attempt(url: string): Promise<ResultSet[]> {
    let resp: Response;
    try {
      resp = await this.transport(url, {
        method: "GET",
        headers: DEFAULT_HEADERS,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      // network failure or timeout
      throw new AttemptError(describeError(e), { retryable: true, cause: e });
    }

    if (!resp.ok) {
      const txt = await resp.text().catch(() => "");
      throw new AttemptError(`HTTP ${resp.status}${txt ? `: ${txt.slice(0, 200)}` : ""}`, {
        retryable: isTransientStatus(resp.status),
        status: resp.status,
      });
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (e) {
      throw new AttemptError(`Invalid JSON from stats API: ${describeError(e)}`, { retryable: false, cause: e });
    }
    const parsed = StatsPayloadSchema.safeParse(body);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new AttemptError(`Unexpected stats payload: ${msg}`, { retryable: false });
    }
    return parsed.data;
  }
}
