import type {
  AssetRecord,
  AssetRecordData,
  AssetStore,
  ConfigResolver,
  TransitionEntry,
} from "./types.js";

export function toAssetData(record: AssetRecord): AssetRecordData {
  return {
    id: record.id,
    name: record.name,
    path: record.path,
    assetType: record.assetType,
    state: record.state,
    taskIds: [...record.taskIds],
    createdAt: record.createdAt.toISOString(),
    history: record.history.map((entry) => ({
      ...entry,
      plugins: [...entry.plugins],
      timestamp: entry.timestamp.toISOString(),
    })),
  };
}

export function fromAssetData(data: AssetRecordData): AssetRecord {
  return {
    ...data,
    taskIds: [...data.taskIds],
    createdAt: new Date(data.createdAt),
    history: data.history.map(
      (entry): TransitionEntry => ({
        ...entry,
        plugins: [...entry.plugins],
        timestamp: new Date(entry.timestamp),
      }),
    ),
  };
}

/**
 * Keeps records in the current project's config (`assets`), saving the
 * project layer on every change. Without a current project nothing loads
 * and saves are refused by the resolver.
 */
export function createProjectAssetStore(resolver: ConfigResolver): AssetStore {
  return {
    load() {
      return (resolver.currentProject()?.assets ?? []).map(fromAssetData);
    },

    async save(records) {
      resolver.update("project", (draft) => {
        draft.assets = records.map(toAssetData);
      });
      await resolver.save("project");
    },
  };
}

/** In-process store, for hosts without a project and for tests */
export function createMemoryAssetStore(initial: AssetRecord[] = []): AssetStore & {
  records(): AssetRecord[];
} {
  let data = initial.map(toAssetData);
  return {
    load() {
      return data.map(fromAssetData);
    },
    async save(records) {
      data = records.map(toAssetData);
    },
    records() {
      return data.map(fromAssetData);
    },
  };
}
