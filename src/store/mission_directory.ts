import { readFileSync } from "node:fs";
import { z } from "zod";

import {
  DatasetProfileSchema,
  KgSnapshotSchema,
  MissionSchema,
  type DatasetProfileInput,
  type KgSnapshotInput,
  type Mission,
  type MissionInput,
} from "../contracts/mission";
import { errorMessage } from "../errors";

export interface MissionDirectory {
  getMission(missionId: string): Promise<Mission | null>;
}

export class FixtureMissionDirectory implements MissionDirectory {
  private missions = new Map<string, Mission>();

  constructor(missions: MissionInput[] = []) {
    for (const mission of missions) this.upsert(mission);
  }

  private upsert(input: MissionInput): Mission {
    const mission = MissionSchema.parse(input);
    this.missions.set(mission.id, mission);
    return mission;
  }

  async getMission(missionId: string): Promise<Mission | null> {
    return this.missions.get(missionId) ?? null;
  }
}

// Fixture file: missions plus the KG snapshots (by namespace) and dataset
// profiles (by mission id) the fixture providers serve.
export const MissionFixtureSchema = z.object({
  missions: z.array(MissionSchema),
  kgSnapshots: z.record(KgSnapshotSchema.omit({ namespace: true })).default({}),
  datasetProfiles: z.record(z.array(DatasetProfileSchema)).default({}),
});

export type MissionFixtures = {
  missions: MissionInput[];
  kgSnapshots: Record<string, KgSnapshotInput>;
  datasetProfiles: Record<string, DatasetProfileInput[]>;
};

export function loadMissionFixtures(path: string): MissionFixtures {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(`Cannot read mission fixtures at ${path}: ${errorMessage(error)}`);
  }
  const parsed = MissionFixtureSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid mission fixtures at ${path}: ${issues}`);
  }
  const kgSnapshots: Record<string, KgSnapshotInput> = {};
  for (const [namespace, snapshot] of Object.entries(parsed.data.kgSnapshots)) {
    kgSnapshots[namespace] = { ...snapshot, namespace };
  }
  return {
    missions: parsed.data.missions,
    kgSnapshots,
    datasetProfiles: parsed.data.datasetProfiles,
  };
}
