import * as k8s from '@kubernetes/client-node';
import type { AdapterError } from '../errors/adapter-errors.js';
import { AdapterErrors, isNotFoundError } from '../errors/adapter-errors.js';
import type { K8sConfigError } from '../errors/k8s-errors.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type {
  IngressSpec,
  QuotaSpec,
  ResourceKind,
  ResourceRef,
  ResourceSpec,
  ServiceSpec,
  VolumeSpec,
  WorkloadSpec,
} from '../manifests/types.js';
import { parseBytes, parseCpuMillicores } from '../quota/quantities.js';
import type { ResourceUsage } from '../quota/types.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import type { ClusterAdapter, NamespacePhase, ObservedState } from './cluster-adapter.js';
import { connect, type K8sConnectionOptions, MANAGED_SELECTOR } from './k8s-config.js';

const WORKSPACE_VOLUME = 'workspace';
const MAIN_CONTAINER = 'ide';

type Target = { kind: ResourceKind; namespace: string; name: string };

const statusCodeOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null) return undefined;
  // ApiException carries the HTTP status as a numeric `code`.
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
};

/**
 * Maps a client error onto the adapter error kinds. Anything without an
 * HTTP status (connection refused, DNS, socket reset) counts as transient.
 */
export function classifyK8sError(error: unknown, target: Target): AdapterError {
  const status = statusCodeOf(error);
  const reason = error instanceof Error ? error.message : String(error);

  if (status === undefined) return AdapterErrors.TRANSIENT(target, reason);
  if (status === 409) return AdapterErrors.CONFLICT(target);
  if (status === 404) return AdapterErrors.NOT_FOUND(target);
  if (status === 408 || status === 429 || status >= 500) {
    return AdapterErrors.TRANSIENT(target, reason);
  }
  return AdapterErrors.REJECTED(target, reason);
}

const toEnvVars = (env: Record<string, string>): k8s.V1EnvVar[] =>
  Object.entries(env).map(([name, value]) => ({ name, value }));

const toUsage = (values: Record<string, string> | undefined): ResourceUsage => {
  const pick = (...keys: string[]) => keys.map((key) => values?.[key]).find(Boolean);
  return {
    cpuMillicores: parseCpuMillicores(pick('limits.cpu', 'requests.cpu', 'cpu') ?? '0') ?? 0,
    memoryBytes: parseBytes(pick('limits.memory', 'requests.memory', 'memory') ?? '0') ?? 0,
    pods: Number(pick('pods') ?? '0') || 0,
  };
};

const namespacePhase = (phase: string | undefined): NamespacePhase =>
  phase === 'Active' || phase === 'Terminating' ? phase : 'Unknown';

function buildQuota(spec: QuotaSpec): k8s.V1ResourceQuota {
  return {
    apiVersion: 'v1',
    kind: 'ResourceQuota',
    metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
    spec: { hard: spec.hard },
  };
}

function buildVolumeClaim(spec: VolumeSpec): k8s.V1PersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
    spec: {
      accessModes: ['ReadWriteOnce'],
      storageClassName: spec.storageClassName,
      resources: { requests: { storage: spec.storage } },
    },
  };
}

function buildDeployment(spec: WorkloadSpec): k8s.V1Deployment {
  const volumeMounts: k8s.V1VolumeMount[] = [{ name: WORKSPACE_VOLUME, mountPath: spec.mountPath }];
  const primaryPort = spec.ports[0];

  const initContainers: k8s.V1Container[] | undefined = spec.init
    ? [
        {
          name: spec.init.name,
          image: spec.init.image,
          command: spec.init.command,
          env: toEnvVars(spec.init.env),
          resources: spec.init.resources,
          volumeMounts,
        },
      ]
    : undefined;

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
    spec: {
      replicas: spec.replicas,
      // The workspace claim is ReadWriteOnce, so old and new pods cannot overlap.
      strategy: { type: 'Recreate' },
      selector: { matchLabels: spec.selector },
      template: {
        metadata: { labels: spec.labels },
        spec: {
          initContainers,
          containers: [
            {
              name: MAIN_CONTAINER,
              image: spec.image,
              ports: spec.ports.map((containerPort) => ({ containerPort })),
              env: toEnvVars(spec.env),
              resources: spec.resources,
              volumeMounts,
              readinessProbe: {
                httpGet: { path: '/', port: primaryPort },
                initialDelaySeconds: 5,
                periodSeconds: 10,
              },
            },
          ],
          volumes: [
            { name: WORKSPACE_VOLUME, persistentVolumeClaim: { claimName: spec.volumeClaimName } },
          ],
        },
      },
    },
  };
}

function buildService(spec: ServiceSpec): k8s.V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
    spec: {
      type: 'ClusterIP',
      selector: spec.selector,
      ports: [{ name: 'http', port: spec.port, targetPort: spec.targetPort }],
    },
  };
}

function buildIngress(spec: IngressSpec): k8s.V1Ingress {
  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
    spec: {
      ingressClassName: spec.ingressClassName,
      rules: [
        {
          host: spec.host,
          http: {
            paths: [
              {
                path: spec.path,
                pathType: 'Prefix',
                backend: { service: { name: spec.serviceName, port: { number: spec.servicePort } } },
              },
            ],
          },
        },
      ],
    },
  };
}

const labelsOf = (metadata: k8s.V1ObjectMeta | undefined) => metadata?.labels ?? {};

export type KubernetesClusterAdapterOptions = {
  kubeConfig: k8s.KubeConfig;
  logger?: Logger;
};

/**
 * Cluster adapter backed by the Kubernetes API.
 * Namespaces, quotas, claims and services go through CoreV1, workloads are
 * Deployments (AppsV1) and the network entry point is an Ingress.
 */
export class KubernetesClusterAdapter implements ClusterAdapter {
  private coreApi: k8s.CoreV1Api;
  private appsApi: k8s.AppsV1Api;
  private networkingApi: k8s.NetworkingV1Api;
  private logger: Logger;

  constructor(options: KubernetesClusterAdapterOptions) {
    this.coreApi = options.kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.appsApi = options.kubeConfig.makeApiClient(k8s.AppsV1Api);
    this.networkingApi = options.kubeConfig.makeApiClient(k8s.NetworkingV1Api);
    this.logger = options.logger ?? createLogger('KubernetesClusterAdapter');
  }

  async createResource(spec: ResourceSpec): Promise<Result<ResourceRef, AdapterError>> {
    const target = { kind: spec.kind, namespace: spec.namespace, name: spec.name };
    const created = await this.call(target, () => this.submit(spec));
    if (!created.ok) {
      return created;
    }
    this.logger.debug('Resource created', { data: target });
    return ok(target);
  }

  async getResource(
    kind: ResourceKind,
    namespace: string,
    name: string
  ): Promise<Result<ObservedState, AdapterError>> {
    return this.call({ kind, namespace, name }, () => this.read(kind, namespace, name));
  }

  async deleteResource(
    kind: ResourceKind,
    namespace: string,
    name: string
  ): Promise<Result<void, AdapterError>> {
    const target = { kind, namespace, name };
    const deleted = await this.call(target, () => this.remove(kind, namespace, name));
    if (!deleted.ok && !isNotFoundError(deleted.error)) {
      return deleted;
    }
    return ok(undefined);
  }

  async listResources(
    kind: ResourceKind,
    namespaceFilter?: string
  ): Promise<Result<ObservedState[], AdapterError>> {
    return this.call({ kind, namespace: namespaceFilter ?? '', name: '*' }, () =>
      this.list(kind, namespaceFilter)
    );
  }

  private async call<T>(target: Target, fn: () => Promise<T>): Promise<Result<T, AdapterError>> {
    try {
      return ok(await fn());
    } catch (error) {
      const classified = classifyK8sError(error, target);
      this.logger.debug('Kubernetes call failed', {
        data: { ...target, code: classified.code },
        error,
      });
      return err(classified);
    }
  }

  private async submit(spec: ResourceSpec): Promise<void> {
    const namespace = spec.namespace;
    switch (spec.kind) {
      case 'namespace':
        await this.coreApi.createNamespace({
          body: { apiVersion: 'v1', kind: 'Namespace', metadata: { name: spec.name, labels: spec.labels } },
        });
        return;
      case 'quota':
        await this.coreApi.createNamespacedResourceQuota({ namespace, body: buildQuota(spec) });
        return;
      case 'volume':
        await this.coreApi.createNamespacedPersistentVolumeClaim({
          namespace,
          body: buildVolumeClaim(spec),
        });
        return;
      case 'workload':
        await this.appsApi.createNamespacedDeployment({ namespace, body: buildDeployment(spec) });
        return;
      case 'service':
        await this.coreApi.createNamespacedService({ namespace, body: buildService(spec) });
        return;
      case 'ingress':
        await this.networkingApi.createNamespacedIngress({ namespace, body: buildIngress(spec) });
        return;
    }
  }

  private async read(kind: ResourceKind, namespace: string, name: string): Promise<ObservedState> {
    switch (kind) {
      case 'namespace':
        return this.observeNamespace(await this.coreApi.readNamespace({ name }));
      case 'quota':
        return this.observeQuota(await this.coreApi.readNamespacedResourceQuota({ name, namespace }));
      case 'volume':
        return this.observeVolume(
          await this.coreApi.readNamespacedPersistentVolumeClaim({ name, namespace })
        );
      case 'workload':
        return this.observeWorkload(await this.appsApi.readNamespacedDeployment({ name, namespace }));
      case 'service':
        return this.observeService(await this.coreApi.readNamespacedService({ name, namespace }));
      case 'ingress':
        return this.observeIngress(
          await this.networkingApi.readNamespacedIngress({ name, namespace })
        );
    }
  }

  private async remove(kind: ResourceKind, namespace: string, name: string): Promise<void> {
    switch (kind) {
      case 'namespace':
        await this.coreApi.deleteNamespace({ name });
        return;
      case 'quota':
        await this.coreApi.deleteNamespacedResourceQuota({ name, namespace });
        return;
      case 'volume':
        await this.coreApi.deleteNamespacedPersistentVolumeClaim({ name, namespace });
        return;
      case 'workload':
        await this.appsApi.deleteNamespacedDeployment({ name, namespace });
        return;
      case 'service':
        await this.coreApi.deleteNamespacedService({ name, namespace });
        return;
      case 'ingress':
        await this.networkingApi.deleteNamespacedIngress({ name, namespace });
        return;
    }
  }

  private async list(kind: ResourceKind, namespace?: string): Promise<ObservedState[]> {
    const labelSelector = MANAGED_SELECTOR;
    switch (kind) {
      case 'namespace': {
        const list = await this.coreApi.listNamespace({ labelSelector });
        return list.items
          .filter((item) => !namespace || (item.metadata?.name ?? '').startsWith(namespace))
          .map((item) => this.observeNamespace(item));
      }
      case 'quota': {
        const list = namespace
          ? await this.coreApi.listNamespacedResourceQuota({ namespace, labelSelector })
          : await this.coreApi.listResourceQuotaForAllNamespaces({ labelSelector });
        return list.items.map((item) => this.observeQuota(item));
      }
      case 'volume': {
        const list = namespace
          ? await this.coreApi.listNamespacedPersistentVolumeClaim({ namespace, labelSelector })
          : await this.coreApi.listPersistentVolumeClaimForAllNamespaces({ labelSelector });
        return list.items.map((item) => this.observeVolume(item));
      }
      case 'workload': {
        const list = namespace
          ? await this.appsApi.listNamespacedDeployment({ namespace, labelSelector })
          : await this.appsApi.listDeploymentForAllNamespaces({ labelSelector });
        return list.items.map((item) => this.observeWorkload(item));
      }
      case 'service': {
        const list = namespace
          ? await this.coreApi.listNamespacedService({ namespace, labelSelector })
          : await this.coreApi.listServiceForAllNamespaces({ labelSelector });
        return list.items.map((item) => this.observeService(item));
      }
      case 'ingress': {
        const list = namespace
          ? await this.networkingApi.listNamespacedIngress({ namespace, labelSelector })
          : await this.networkingApi.listIngressForAllNamespaces({ labelSelector });
        return list.items.map((item) => this.observeIngress(item));
      }
    }
  }

  private observeNamespace(item: k8s.V1Namespace): ObservedState {
    const name = item.metadata?.name ?? '';
    return {
      kind: 'namespace',
      namespace: name,
      name,
      labels: labelsOf(item.metadata),
      phase: namespacePhase(item.status?.phase),
    };
  }

  private observeQuota(item: k8s.V1ResourceQuota): ObservedState {
    return {
      kind: 'quota',
      namespace: item.metadata?.namespace ?? '',
      name: item.metadata?.name ?? '',
      labels: labelsOf(item.metadata),
      hard: toUsage(item.status?.hard ?? item.spec?.hard),
      used: toUsage(item.status?.used),
    };
  }

  private observeVolume(item: k8s.V1PersistentVolumeClaim): ObservedState {
    return {
      kind: 'volume',
      namespace: item.metadata?.namespace ?? '',
      name: item.metadata?.name ?? '',
      labels: labelsOf(item.metadata),
      phase: item.status?.phase ?? 'Unknown',
    };
  }

  private observeWorkload(item: k8s.V1Deployment): ObservedState {
    return {
      kind: 'workload',
      namespace: item.metadata?.namespace ?? '',
      name: item.metadata?.name ?? '',
      labels: labelsOf(item.metadata),
      desiredReplicas: item.spec?.replicas ?? 1,
      readyReplicas: item.status?.readyReplicas ?? 0,
    };
  }

  private observeService(item: k8s.V1Service): ObservedState {
    return {
      kind: 'service',
      namespace: item.metadata?.namespace ?? '',
      name: item.metadata?.name ?? '',
      labels: labelsOf(item.metadata),
      clusterIP: item.spec?.clusterIP,
    };
  }

  private observeIngress(item: k8s.V1Ingress): ObservedState {
    return {
      kind: 'ingress',
      namespace: item.metadata?.namespace ?? '',
      name: item.metadata?.name ?? '',
      labels: labelsOf(item.metadata),
      host: item.spec?.rules?.[0]?.host,
      ready: (item.status?.loadBalancer?.ingress?.length ?? 0) > 0,
    };
  }
}

/** Loads kubeconfig (with context selection) and builds the adapter. */
export function createKubernetesClusterAdapter(
  options: K8sConnectionOptions & { logger?: Logger } = {}
): Result<KubernetesClusterAdapter, K8sConfigError> {
  const kubeConfig = connect(options);
  if (!kubeConfig.ok) {
    return kubeConfig;
  }
  return ok(new KubernetesClusterAdapter({ kubeConfig: kubeConfig.value, logger: options.logger }));
}
