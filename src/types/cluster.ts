import type { PodSnapshot } from './workload';

// Additive JSON merge-patch applied to a pod's metadata
export interface PodPatch {
  metadata: {
    annotations: Record<string, string>;
  };
}

export interface PodLister {
  // Lists pods in one namespace, or in every namespace the credentials can see
  listPods(namespace?: string): Promise<PodSnapshot[]>;
}

export interface PodPatcher {
  patchPod(namespace: string, name: string, patch: PodPatch): Promise<void>;
}

export interface ClusterApi extends PodLister, PodPatcher {}
