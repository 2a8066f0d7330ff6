import { KgSnapshotSchema, type KgSnapshot, type KgSnapshotInput, type Mission } from "../contracts/mission";
import { UpstreamResponseError } from "../errors";

export interface KgSnapshotProvider {
  getSnapshot(args: { missionId: string; namespace: string; signal: AbortSignal }): Promise<KgSnapshot>;
}

export class KgProviderError extends UpstreamResponseError {
  constructor(message: string, statusCode?: number) {
    super(message, { statusCode });
    this.name = "KgProviderError";
  }
}

/** Missions without an explicit namespace share the `mission-<id>` convention. */
export function resolveKgNamespace(mission: Pick<Mission, "id" | "kgNamespace">): string {
  return mission.kgNamespace?.trim() || `mission-${mission.id}`;
}

export function parseKgSnapshot(raw: unknown): KgSnapshot {
  const parsed = KgSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new KgProviderError(`Invalid KG snapshot: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`);
  }
  return parsed.data;
}

export class HttpKgSnapshotProvider implements KgSnapshotProvider {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async getSnapshot(args: { missionId: string; namespace: string; signal: AbortSignal }): Promise<KgSnapshot> {
    const url = `${this.baseUrl}/projects/${encodeURIComponent(args.namespace)}/snapshot`;
    const res = await this.fetchImpl(url, {
      headers: { accept: "application/json", "x-mission-id": args.missionId },
      signal: args.signal,
    });
    if (!res.ok) {
      throw new KgProviderError(`KG snapshot request failed with ${res.status}`, res.status);
    }
    return parseKgSnapshot(await res.json());
  }
}

/**
 * Serves snapshots from fixture data keyed by namespace. An unknown
 * namespace yields an empty graph rather than an outage.
 */
export class FixtureKgSnapshotProvider implements KgSnapshotProvider {
  private readonly snapshots = new Map<string, KgSnapshot>();

  constructor(snapshots: Record<string, KgSnapshotInput> = {}) {
    for (const [namespace, snapshot] of Object.entries(snapshots)) {
      this.snapshots.set(namespace, parseKgSnapshot({ ...snapshot, namespace }));
    }
  }

  async getSnapshot(args: { missionId: string; namespace: string; signal: AbortSignal }): Promise<KgSnapshot> {
    args.signal.throwIfAborted();
    return this.snapshots.get(args.namespace) ?? parseKgSnapshot({ namespace: args.namespace });
  }
}
