import { describe, it, expect, vi } from 'vitest';
import { KubeConfig } from '@kubernetes/client-node';
import type { ConnectionStrategy } from '../../src/cluster/k8sClient';
import { ScanSession } from '../../src/session/scanSession';
import {
  ClusterConnectionError,
  ConfigLoadError,
  SessionStateError,
  type ClusterApi,
  type PodSnapshot
} from '../../src/types';
import { MemoryLogger } from '../helpers/memoryLogger';

function strategy(name: string, fail?: string): ConnectionStrategy {
  return {
    name,
    connect: vi.fn(() => {
      if (fail) throw new ConfigLoadError(fail);
      return new KubeConfig();
    })
  };
}

function fakeApi(pods: PodSnapshot[] | Error) {
  const listPods = vi.fn<ClusterApi['listPods']>(async () => {
    if (pods instanceof Error) throw pods;
    return pods;
  });
  const patchPod = vi.fn<ClusterApi['patchPod']>(async () => {});
  const api: ClusterApi = { listPods, patchPod };
  return { api, listPods, patchPod };
}

function createSession(api: ClusterApi, strategies: ConnectionStrategy[] = [strategy('fake config')]) {
  const logger = new MemoryLogger();
  const session = new ScanSession({ strategies, logger, createApi: () => api });
  return { session, logger };
}

const webPod: PodSnapshot = {
  namespace: 'ns-a',
  name: 'web-1',
  containers: [{ name: 'app', limits: { cpu: '500m' } }, { name: 'sidecar' }]
};

describe('ScanSession', () => {
  describe('connect', () => {
    it('should use the first strategy that succeeds', () => {
      const inCluster = strategy('in-cluster config', 'not in a cluster');
      const kubeconfig = strategy('kubeconfig');
      const later = strategy('never used');
      const { session, logger } = createSession(fakeApi([]).api, [inCluster, kubeconfig, later]);

      session.connect();

      expect(session.state).toBe('connected');
      expect(later.connect).not.toHaveBeenCalled();
      expect(logger.messages('debug')).toEqual(['Could not load in-cluster config: not in a cluster']);
      expect(logger.messages('info')).toEqual(['Successfully connected to Kubernetes cluster using kubeconfig']);
    });

    it('should fail when every strategy fails', () => {
      const { session } = createSession(fakeApi([]).api, [strategy('a', 'no env'), strategy('b', 'no file')]);

      expect(() => session.connect()).toThrow(ClusterConnectionError);
      expect(session.state).toBe('failed');
    });

    it('should list every failed attempt on the error', () => {
      const { session } = createSession(fakeApi([]).api, [strategy('a', 'no env'), strategy('b', 'no file')]);

      let caught: unknown;
      try {
        session.connect();
      } catch (error: unknown) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ClusterConnectionError);
      expect(caught).toMatchObject({ attempts: ['a: no env', 'b: no file'] });
    });
  });

  describe('state machine', () => {
    it('should refuse to scan before connecting', async () => {
      const { session } = createSession(fakeApi([]).api);

      await expect(session.scan()).rejects.toThrow(SessionStateError);
    });

    it('should refuse to report before scanning', () => {
      const { session } = createSession(fakeApi([]).api);
      session.connect();

      expect(() => session.report([], 'table')).toThrow('Cannot report while the session is connected');
    });

    it('should move through every state in order', async () => {
      const { session } = createSession(fakeApi([webPod]).api);
      const seen: string[] = [session.state];

      session.connect();
      seen.push(session.state);
      const result = await session.scan();
      seen.push(session.state);
      await session.annotate(result.findings);
      seen.push(session.state);
      session.report(result.findings, 'json');
      seen.push(session.state);

      expect(seen).toEqual(['disconnected', 'connected', 'evaluated', 'annotating', 'done']);
    });
  });

  describe('scan', () => {
    it('should list a single namespace when one is given', async () => {
      const { api, listPods } = fakeApi([webPod]);
      const { session, logger } = createSession(api);
      session.connect();

      const result = await session.scan('ns-a');

      expect(listPods).toHaveBeenCalledWith('ns-a');
      expect(result.complete).toBe(true);
      expect(result.findings).toHaveLength(2);
      expect(logger.messages('info')).toContain('Checking pods in namespace: ns-a');
    });

    it('should list all namespaces when none is given', async () => {
      const { api, listPods } = fakeApi([]);
      const { session, logger } = createSession(api);
      session.connect();

      await session.scan();

      expect(listPods).toHaveBeenCalledWith(undefined);
      expect(logger.messages('info')).toContain('Checking pods across all namespaces');
    });

    it('should degrade to an incomplete, empty scan when listing fails', async () => {
      const forbidden = Object.assign(new Error('HTTP-Code: 403'), { code: 403, body: { message: 'pods is forbidden' } });
      const { session, logger } = createSession(fakeApi(forbidden).api);
      session.connect();

      const result = await session.scan();

      expect(result).toEqual({ findings: [], complete: false });
      expect(session.state).toBe('evaluated');
      expect(logger.messages('error')).toEqual(['Kubernetes API error while listing pods: 403 - pods is forbidden']);
      expect(logger.messages('warn')).toEqual([
        'Scan incomplete: pods could not be listed, no findings will be reported'
      ]);
    });
  });

  describe('run', () => {
    it('should annotate the web pod once with no-limits', async () => {
      const { api, patchPod } = fakeApi([webPod]);
      const { session } = createSession(api);

      const outcome = await session.run({ annotate: true, output: 'csv' });

      expect(outcome.exitCode).toBe(0);
      expect(outcome.annotation).toEqual({ succeeded: 1, failed: 0 });
      expect(patchPod).toHaveBeenCalledTimes(1);
      expect(patchPod).toHaveBeenCalledWith('ns-a', 'web-1', { metadata: { annotations: { warning: 'no-limits' } } });
      expect(outcome.output).toBe(
        [
          'NAMESPACE,POD_NAME,CONTAINER_NAME,MISSING_CPU_LIMIT,MISSING_MEMORY_LIMIT',
          '"ns-a","web-1","app","false","true"',
          '"ns-a","web-1","sidecar","true","true"'
        ].join('\n')
      );
    });

    it('should make no patch calls for an empty cluster with annotation on', async () => {
      const { api, patchPod } = fakeApi([]);
      const { session, logger } = createSession(api);

      const outcome = await session.run({ annotate: true, output: 'table' });

      expect(outcome.exitCode).toBe(0);
      expect(outcome.output).toBe('No containers with missing resource limits found.');
      expect(outcome.annotation).toEqual({ succeeded: 0, failed: 0 });
      expect(patchPod).not.toHaveBeenCalled();
      expect(logger.messages('info')).toContain('No pods with missing limits found - nothing to annotate');
    });

    it('should not annotate unless asked', async () => {
      const { api, patchPod } = fakeApi([webPod]);
      const { session } = createSession(api);

      const outcome = await session.run({ annotate: false, output: 'json' });

      expect(outcome.annotation).toBeUndefined();
      expect(patchPod).not.toHaveBeenCalled();
    });

    it('should keep exit code 0 when annotations fail', async () => {
      const { api, patchPod } = fakeApi([webPod]);
      patchPod.mockRejectedValue(new Error('connection reset'));
      const { session, logger } = createSession(api);

      const outcome = await session.run({ annotate: true, output: 'table' });

      expect(outcome.exitCode).toBe(0);
      expect(outcome.annotation).toEqual({ succeeded: 0, failed: 1 });
      expect(logger.messages('warn')).toEqual(['1 pod(s) could not be annotated. Check logs for details.']);
    });

    it('should exit with 1 and no output when it cannot connect', async () => {
      const { api, listPods } = fakeApi([webPod]);
      const { session, logger } = createSession(api, [strategy('in-cluster config', 'no env')]);

      const outcome = await session.run({ annotate: false, output: 'table' });

      expect(outcome).toEqual({ exitCode: 1 });
      expect(listPods).not.toHaveBeenCalled();
      expect(logger.messages('error')).toEqual(['Failed to connect to Kubernetes cluster: in-cluster config: no env']);
    });

    it('should report an incomplete scan with exit code 0', async () => {
      const { session, logger } = createSession(fakeApi(new Error('socket hang up')).api);

      const outcome = await session.run({ annotate: false, output: 'json' });

      expect(outcome.exitCode).toBe(0);
      expect(outcome.output).toBe('[]');
      expect(outcome.result?.complete).toBe(false);
      expect(logger.messages('info')).toContain('Kubernetes pod resource limits check finished with an incomplete scan');
    });
  });
});
