/**
 * Write-through cache for derived products (gap analyses and reports),
 * keyed by mission and product key. Payloads are stored as plain JSON and
 * re-validated by the caller on read.
 */
export type StoredResult = {
  missionId: string;
  key: string;
  registryVersion: string;
  payload: unknown;
  storedAt: string;
};

export interface ResultStore {
  get(missionId: string, key: string): Promise<StoredResult | null>;
  put(args: { missionId: string; key: string; registryVersion: string; payload: unknown }): Promise<StoredResult>;
}

export function isExpired(storedAt: string, ttlSeconds: number, now: Date): boolean {
  if (ttlSeconds <= 0) return false;
  return now.getTime() - Date.parse(storedAt) > ttlSeconds * 1000;
}

export class MemoryResultStore implements ResultStore {
  private entries = new Map<string, StoredResult>(); // `${missionId}\u0000${key}` -> entry

  constructor(
    private readonly ttlSeconds: number = 0,
    private readonly now: () => Date = () => new Date()
  ) {}

  private static slot(missionId: string, key: string): string {
    return `${missionId}\u0000${key}`;
  }

  async get(missionId: string, key: string): Promise<StoredResult | null> {
    const slot = MemoryResultStore.slot(missionId, key);
    const entry = this.entries.get(slot);
    if (!entry) return null;
    if (isExpired(entry.storedAt, this.ttlSeconds, this.now())) {
      this.entries.delete(slot);
      return null;
    }
    return entry;
  }

  async put(args: {
    missionId: string;
    key: string;
    registryVersion: string;
    payload: unknown;
  }): Promise<StoredResult> {
    // Round-trip through JSON so cached payloads never alias live objects.
    const entry: StoredResult = {
      ...args,
      payload: JSON.parse(JSON.stringify(args.payload)),
      storedAt: this.now().toISOString(),
    };
    this.entries.set(MemoryResultStore.slot(args.missionId, args.key), entry);
    return entry;
  }
}
