import * as fs from 'node:fs';
import * as k8s from '@kubernetes/client-node';
import { ConfigLoadError } from '../types/errors';
import type { ClusterApi, PodPatch } from '../types/cluster';
import type { ContainerSnapshot, PodSnapshot } from '../types/workload';

export const SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

// One way of finding cluster credentials; throws when its source is unusable
export interface ConnectionStrategy {
  name: string;
  connect(): k8s.KubeConfig;
}

export interface InClusterOptions {
  env?: Record<string, string | undefined>;
  tokenPath?: string;
}

// Credentials mounted into the pod this process runs in
export function inClusterStrategy(options: InClusterOptions = {}): ConnectionStrategy {
  const env = options.env ?? process.env;
  const tokenPath = options.tokenPath ?? SERVICE_ACCOUNT_TOKEN_PATH;

  return {
    name: 'in-cluster config',
    connect: () => {
      if (!env.KUBERNETES_SERVICE_HOST || !env.KUBERNETES_SERVICE_PORT) {
        throw new ConfigLoadError('KUBERNETES_SERVICE_HOST and KUBERNETES_SERVICE_PORT are not set');
      }
      if (!fs.existsSync(tokenPath)) {
        throw new ConfigLoadError(`Service account token not found at ${tokenPath}`);
      }
      const kc = new k8s.KubeConfig();
      kc.loadFromCluster();
      return kc;
    }
  };
}

export interface KubeconfigOptions {
  paths: string[];
  context?: string | undefined;
}

function loadKubeconfigFile(file: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromFile(file);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`Invalid kubeconfig ${file}: ${message}`);
  }
  return kc;
}

// Files that do not exist are skipped; the first current-context set wins
export function loadKubeconfigFiles(paths: string[]): k8s.KubeConfig {
  const existing = paths.filter(file => fs.existsSync(file));
  const [first, ...rest] = existing;
  if (first === undefined) {
    throw new ConfigLoadError(`Kubeconfig not found at ${paths.join(', ')}`);
  }

  const kc = loadKubeconfigFile(first);
  for (const file of rest) {
    const next = loadKubeconfigFile(file);
    try {
      kc.mergeConfig(next, Boolean(kc.getCurrentContext()));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigLoadError(`Cannot merge kubeconfig ${file}: ${message}`);
    }
  }
  return kc;
}

// Local kubeconfig files, for running outside the cluster
export function kubeconfigStrategy(options: KubeconfigOptions): ConnectionStrategy {
  return {
    name: 'kubeconfig',
    connect: () => {
      const kc = loadKubeconfigFiles(options.paths);
      const source = options.paths.join(', ');

      if (options.context) {
        if (!kc.getContextObject(options.context)) {
          const available = kc.getContexts().map(c => c.name);
          throw new ConfigLoadError(
            `Context "${options.context}" not found. Available contexts: ${available.join(', ')}`
          );
        }
        kc.setCurrentContext(options.context);
      }

      if (!kc.getCurrentContext()) {
        throw new ConfigLoadError(`Kubeconfig ${source} has no current context`);
      }
      if (!kc.getCurrentCluster()) {
        throw new ConfigLoadError(`Context "${kc.getCurrentContext()}" does not reference a known cluster`);
      }
      return kc;
    }
  };
}

export interface StrategyOptions {
  kubeconfigPaths: string[];
  context?: string | undefined;
}

// In-cluster first; an explicit --context means the caller wants their kubeconfig
export function defaultStrategies(options: StrategyOptions): ConnectionStrategy[] {
  const kubeconfig = kubeconfigStrategy({ paths: options.kubeconfigPaths, context: options.context });
  return options.context ? [kubeconfig, inClusterStrategy()] : [inClusterStrategy(), kubeconfig];
}

function toContainerSnapshot(container: k8s.V1Container): ContainerSnapshot {
  return { name: container.name, limits: container.resources?.limits };
}

export function toPodSnapshot(pod: k8s.V1Pod): PodSnapshot {
  return {
    namespace: pod.metadata?.namespace ?? '',
    name: pod.metadata?.name ?? '',
    containers: (pod.spec?.containers ?? []).map(toContainerSnapshot)
  };
}

export class KubernetesClusterApi implements ClusterApi {
  private readonly coreApi: k8s.CoreV1Api;

  constructor(kc: k8s.KubeConfig) {
    this.coreApi = kc.makeApiClient(k8s.CoreV1Api);
  }

  async listPods(namespace?: string): Promise<PodSnapshot[]> {
    const res = namespace
      ? await this.coreApi.listNamespacedPod({ namespace })
      : await this.coreApi.listPodForAllNamespaces({});
    return res.items.map(toPodSnapshot);
  }

  async patchPod(namespace: string, name: string, patch: PodPatch): Promise<void> {
    await this.coreApi.patchNamespacedPod(
      { name, namespace, body: patch },
      k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.MergePatch)
    );
  }
}
