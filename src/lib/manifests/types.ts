export type ResourceKind = 'namespace' | 'quota' | 'volume' | 'workload' | 'service' | 'ingress';

/**
 * Submission order. Quota precedes the workload so enforcement is active
 * before any pod is admitted; the network entry point comes last.
 */
export const RESOURCE_ORDER: readonly ResourceKind[] = [
  'namespace',
  'quota',
  'volume',
  'workload',
  'service',
  'ingress',
];

export type ResourceRef = {
  kind: ResourceKind;
  /** For namespaces this equals `name`. */
  namespace: string;
  name: string;
};

type SpecBase<K extends ResourceKind> = {
  kind: K;
  namespace: string;
  name: string;
  labels: Record<string, string>;
};

export type NamespaceSpec = SpecBase<'namespace'>;

export type QuotaSpec = SpecBase<'quota'> & {
  hard: Record<string, string>;
};

export type VolumeSpec = SpecBase<'volume'> & {
  storage: string;
  storageClassName?: string;
};

export type ContainerResources = {
  requests: { cpu: string; memory: string };
  limits: { cpu: string; memory: string };
};

export type InitStep = {
  name: string;
  image: string;
  command: string[];
  env: Record<string, string>;
  resources: ContainerResources;
};

export type WorkloadSpec = SpecBase<'workload'> & {
  replicas: number;
  image: string;
  ports: number[];
  env: Record<string, string>;
  resources: ContainerResources;
  selector: Record<string, string>;
  volumeClaimName: string;
  mountPath: string;
  init?: InitStep;
};

export type ServiceSpec = SpecBase<'service'> & {
  port: number;
  targetPort: number;
  selector: Record<string, string>;
};

export type IngressSpec = SpecBase<'ingress'> & {
  host: string;
  path: string;
  serviceName: string;
  servicePort: number;
  ingressClassName?: string;
};

export type ResourceSpec =
  | NamespaceSpec
  | QuotaSpec
  | VolumeSpec
  | WorkloadSpec
  | ServiceSpec
  | IngressSpec;

export type EnvironmentIdentity = {
  environmentId: string;
  userId: string;
  /** Human-chosen identity the slug and every resource name derive from. */
  name: string;
};

export type ManifestTemplate = {
  id: string;
  name: string;
  image: string;
  env: Record<string, string>;
  ports: number[];
};

export type GitSource = {
  url: string;
  branch: string;
};

export type ManifestOptions = {
  ingressDomain: string;
  containerPort: number;
  gitInitImage: string;
  workspaceMountPath: string;
  gitSource?: GitSource;
  env?: Record<string, string>;
  ports?: number[];
  ingressClassName?: string;
  storageClassName?: string;
};

export type Manifest = {
  slug: string;
  namespace: string;
  host: string;
  accessUrl: string;
  specs: ResourceSpec[];
};

export const toRef = (spec: ResourceSpec): ResourceRef => ({
  kind: spec.kind,
  namespace: spec.namespace,
  name: spec.name,
});

export const formatRef = (ref: ResourceRef): string =>
  ref.kind === 'namespace' ? `namespace/${ref.name}` : `${ref.kind}/${ref.namespace}/${ref.name}`;
