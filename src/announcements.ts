export class AnnouncementsError extends Error {
  status: number | null;
  code: string;

  constructor(message: string, code: string, status: number | null = null) {
    super(message);
    this.name = "AnnouncementsError";
    this.code = code;
    this.status = status;
  }
}

export type FetchOptions = {
  count?: number;
  page?: number;
  pageSize?: number;
};

/** Client for the public support-programme announcements feed. */
export class AnnouncementsClient {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly baseUrl: string
  ) {}

  async fetchLatest(options: FetchOptions = {}): Promise<unknown> {
    const key = (this.apiKey ?? "").trim();
    if (!key) {
      throw new AnnouncementsError("announcements API key is not configured", "missing_api_key");
    }

    const count = options.count ?? 20;
    const params = new URLSearchParams({
      crtfcKey: key,
      dataType: "json",
      searchCnt: count > 0 ? String(count) : "",
      pageIndex: String(options.page ?? 1),
      pageUnit: String(options.pageSize ?? 10)
    });

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}?${params.toString()}`, {
        signal: AbortSignal.timeout(15_000)
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new AnnouncementsError(message, "network");
    }

    const text = await res.text();
    if (!res.ok) {
      throw new AnnouncementsError(`Request failed: ${text.slice(0, 200)}`, `http_${res.status}`, res.status);
    }

    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch {
      throw new AnnouncementsError(`Invalid response: ${text.slice(0, 200)}`, "invalid_json", res.status);
    }
  }
}
