import { DatasetProfileListSchema, type DatasetProfile, type DatasetProfileInput } from "../contracts/mission";
import { UpstreamResponseError } from "../errors";

export interface DatasetProfileProvider {
  getProfiles(args: { missionId: string; signal: AbortSignal }): Promise<DatasetProfile[]>;
}

export class DatasetProfileProviderError extends UpstreamResponseError {
  constructor(message: string, statusCode?: number) {
    super(message, { statusCode });
    this.name = "DatasetProfileProviderError";
  }
}

function parseProfiles(raw: unknown): DatasetProfile[] {
  const parsed = DatasetProfileListSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new DatasetProfileProviderError(
      `Invalid dataset profiles: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`
    );
  }
  return parsed.data;
}

export class HttpDatasetProfileProvider implements DatasetProfileProvider {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async getProfiles(args: { missionId: string; signal: AbortSignal }): Promise<DatasetProfile[]> {
    const res = await this.fetchImpl(`${this.baseUrl}/missions/${encodeURIComponent(args.missionId)}/profiles`, {
      headers: { accept: "application/json" },
      signal: args.signal,
    });
    if (!res.ok) {
      throw new DatasetProfileProviderError(`Dataset profile request failed with ${res.status}`, res.status);
    }
    return parseProfiles(await res.json());
  }
}

export class FixtureDatasetProfileProvider implements DatasetProfileProvider {
  private readonly profiles = new Map<string, DatasetProfile[]>();

  constructor(profiles: Record<string, DatasetProfileInput[]> = {}) {
    for (const [missionId, list] of Object.entries(profiles)) {
      this.profiles.set(missionId, parseProfiles(list));
    }
  }

  async getProfiles(args: { missionId: string; signal: AbortSignal }): Promise<DatasetProfile[]> {
    args.signal.throwIfAborted();
    return this.profiles.get(args.missionId) ?? [];
  }
}
