import type { Resource } from "./model.js";

export interface UrlSnapshot {
  name: string;
  url: string;
  isInternal: boolean;
}

/** Published state of a resource. Snapshots are replaced, never mutated. */
export interface ResourceSnapshot {
  resourceType: string;
  state?: string;
  urls: UrlSnapshot[];
  exitCode?: number;
  properties: Record<string, string>;
}

export type SnapshotPatch = (snapshot: ResourceSnapshot) => ResourceSnapshot;

export interface ResourceUpdate {
  resource: Resource;
  snapshot: ResourceSnapshot;
}

export type ResourceUpdateListener = (update: ResourceUpdate) => void;

/** Records resource state transitions and fans them out to subscribers. */
export class ResourceNotificationService {
  private readonly snapshots = new Map<Resource, ResourceSnapshot>();
  private readonly listeners = new Set<ResourceUpdateListener>();

  getSnapshot(resource: Resource): ResourceSnapshot {
    return (
      this.snapshots.get(resource) ?? {
        resourceType: resource.resourceType,
        urls: [],
        properties: {},
      }
    );
  }

  /** Apply `patch` to the resource's current snapshot and notify subscribers. */
  async publishUpdate(resource: Resource, patch: SnapshotPatch): Promise<void> {
    const snapshot = patch(this.getSnapshot(resource));
    this.snapshots.set(resource, snapshot);
    for (const listener of [...this.listeners]) {
      listener({ resource, snapshot });
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ResourceUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolve once the resource reaches `state` (immediately if it already has). */
  waitForState(resource: Resource, state: string, signal?: AbortSignal): Promise<ResourceSnapshot> {
    const current = this.getSnapshot(resource);
    if (current.state === state) return Promise.resolve(current);

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        unsubscribe();
        reject(signal?.reason ?? new Error("Aborted"));
      };
      const unsubscribe = this.subscribe((update) => {
        if (update.resource === resource && update.snapshot.state === state) {
          unsubscribe();
          signal?.removeEventListener("abort", onAbort);
          resolve(update.snapshot);
        }
      });
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
