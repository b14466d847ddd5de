/**
 * A key-value namespace that both the staging process and the consuming
 * process can reach. Each single-key write is atomic; writes to different
 * keys are not ordered or grouped.
 */
export interface SharedKeyValueStore {
  readonly description: SharedStoreDescription;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
}

export type SharedStoreDescription =
  | { kind: "filesystem"; dir: string; sharingGroup: string }
  | { kind: "gcs"; bucket: string; prefix: string; sharingGroup: string };
