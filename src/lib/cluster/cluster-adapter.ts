import type { AdapterError } from '../errors/adapter-errors.js';
import type { ResourceKind, ResourceRef, ResourceSpec } from '../manifests/types.js';
import type { ResourceUsage } from '../quota/types.js';
import type { Result } from '../utils/result.js';

export type NamespacePhase = 'Active' | 'Terminating' | 'Unknown';

type ObservedBase<K extends ResourceKind> = {
  kind: K;
  namespace: string;
  name: string;
  labels: Record<string, string>;
};

export type ObservedNamespace = ObservedBase<'namespace'> & { phase: NamespacePhase };

export type ObservedQuota = ObservedBase<'quota'> & {
  hard: ResourceUsage;
  used: ResourceUsage;
};

export type ObservedVolume = ObservedBase<'volume'> & { phase: string };

export type ObservedWorkload = ObservedBase<'workload'> & {
  desiredReplicas: number;
  readyReplicas: number;
};

export type ObservedService = ObservedBase<'service'> & { clusterIP?: string };

export type ObservedIngress = ObservedBase<'ingress'> & {
  host?: string;
  ready: boolean;
};

export type ObservedState =
  | ObservedNamespace
  | ObservedQuota
  | ObservedVolume
  | ObservedWorkload
  | ObservedService
  | ObservedIngress;

/**
 * Capability interface onto the cluster control plane.
 *
 * - `createResource` fails with a conflict when the name is taken.
 * - `getResource` fails with not-found when the object is absent.
 * - `deleteResource` succeeds when the object is already gone.
 * - `listResources` takes a namespace for namespaced kinds; for namespaces
 *   it is a name prefix.
 */
export interface ClusterAdapter {
  createResource(spec: ResourceSpec): Promise<Result<ResourceRef, AdapterError>>;
  getResource(
    kind: ResourceKind,
    namespace: string,
    name: string
  ): Promise<Result<ObservedState, AdapterError>>;
  deleteResource(
    kind: ResourceKind,
    namespace: string,
    name: string
  ): Promise<Result<void, AdapterError>>;
  listResources(
    kind: ResourceKind,
    namespaceFilter?: string
  ): Promise<Result<ObservedState[], AdapterError>>;
}
