import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { isExpired, type ResultStore, type StoredResult } from "./result_store";

type ResultRow = {
  mission_id: string;
  result_key: string;
  registry_version: string;
  payload_json: string;
  stored_at: string;
};

export class SqliteResultStore implements ResultStore {
  private db: Database.Database;

  constructor(
    dbPath: string = "./data/results.db",
    private readonly ttlSeconds: number = 0,
    private readonly now: () => Date = () => new Date()
  ) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS derived_results (
        mission_id TEXT NOT NULL,
        result_key TEXT NOT NULL,
        registry_version TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        stored_at TEXT NOT NULL,
        PRIMARY KEY (mission_id, result_key)
      );

      CREATE INDEX IF NOT EXISTS idx_derived_results_mission
        ON derived_results(mission_id);
    `);
  }

  async get(missionId: string, key: string): Promise<StoredResult | null> {
    const row = this.db
      .prepare<[string, string], ResultRow>(`
        SELECT * FROM derived_results WHERE mission_id = ? AND result_key = ?
      `)
      .get(missionId, key);
    if (!row) return null;

    if (isExpired(row.stored_at, this.ttlSeconds, this.now())) {
      this.db
        .prepare<[string, string]>("DELETE FROM derived_results WHERE mission_id = ? AND result_key = ?")
        .run(missionId, key);
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload_json);
    } catch {
      // Unreadable rows behave as a miss and get overwritten on the next put.
      return null;
    }

    return {
      missionId: row.mission_id,
      key: row.result_key,
      registryVersion: row.registry_version,
      payload,
      storedAt: row.stored_at,
    };
  }

  async put(args: {
    missionId: string;
    key: string;
    registryVersion: string;
    payload: unknown;
  }): Promise<StoredResult> {
    const payloadJson = JSON.stringify(args.payload);
    const entry: StoredResult = {
      missionId: args.missionId,
      key: args.key,
      registryVersion: args.registryVersion,
      payload: JSON.parse(payloadJson),
      storedAt: this.now().toISOString(),
    };

    this.db
      .prepare<[string, string, string, string, string]>(`
        INSERT OR REPLACE INTO derived_results (mission_id, result_key, registry_version, payload_json, stored_at)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(entry.missionId, entry.key, entry.registryVersion, payloadJson, entry.storedAt);

    return entry;
  }

  close(): void {
    this.db.close();
  }
}
