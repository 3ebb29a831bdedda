import { StorageStateSchema, type StorageState } from "../domain/models";

export { StorageStateSchema, type StorageState };

export function serializeStorageState(state: StorageState): string {
  return JSON.stringify(state);
}

export function parseStorageState(json: string): StorageState {
  const parsed: unknown = JSON.parse(json);
  return StorageStateSchema.parse(parsed);
}
