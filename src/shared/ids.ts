import { v7 as uuidv7, validate, version } from "uuid";

/** Time-ordered id, so stored snapshots sort by creation. */
export function createSnapshotId(): string {
  return uuidv7();
}

export function isSnapshotId(value: string): boolean {
  return validate(value) && version(value) === 7;
}
