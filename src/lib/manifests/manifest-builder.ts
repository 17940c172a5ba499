import type { EnvironmentError } from '../errors/environment-errors.js';
import { EnvironmentErrors } from '../errors/environment-errors.js';
import { formatBytes, formatCpu } from '../quota/quantities.js';
import type { QuotaPolicy } from '../quota/types.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { sortedEntries } from '../utils/sort.js';
import { MANAGED_LABELS, resourceNames, slugify, toLabelValue } from './naming.js';
import type {
  ContainerResources,
  EnvironmentIdentity,
  GitSource,
  InitStep,
  Manifest,
  ManifestOptions,
  ManifestTemplate,
  ResourceSpec,
} from './types.js';

/** Object counts every sandbox namespace may hold besides pods and services. */
export const FIXED_QUOTA_ENTRIES = {
  persistentvolumeclaims: '3',
  secrets: '10',
  configmaps: '10',
} as const;

const INIT_CPU_LIMIT_MILLICORES = 250;
const INIT_MEMORY_LIMIT_BYTES = 256 * 1024 ** 2;

const sortedRecord = (record: Record<string, string>): Record<string, string> =>
  Object.fromEntries(sortedEntries(record));

const isValidPort = (port: number) => Number.isInteger(port) && port >= 1 && port <= 65535;

export function buildQuotaHard(quota: QuotaPolicy): Record<string, string> {
  return {
    'limits.cpu': formatCpu(quota.cpuMillicores),
    'limits.memory': formatBytes(quota.memoryBytes),
    'requests.cpu': formatCpu(quota.cpuMillicores / 2),
    'requests.memory': formatBytes(Math.floor(quota.memoryBytes / 2)),
    'requests.storage': formatBytes(quota.storageBytes),
    pods: String(quota.maxPods),
    services: String(quota.maxServices),
    ...FIXED_QUOTA_ENTRIES,
  };
}

function containerResources(cpuMillicores: number, memoryBytes: number): ContainerResources {
  return {
    requests: {
      cpu: formatCpu(cpuMillicores / 2),
      memory: formatBytes(Math.floor(memoryBytes / 2)),
    },
    limits: { cpu: formatCpu(cpuMillicores), memory: formatBytes(memoryBytes) },
  };
}

/**
 * The clone is skipped when the workspace already holds a checkout, which
 * happens when a stopped environment is started again on the same volume.
 */
function gitCloneStep(
  source: GitSource,
  image: string,
  mountPath: string,
  quota: QuotaPolicy
): InitStep {
  const script = [
    `if [ -d "${mountPath}/src/.git" ]; then exit 0; fi`,
    `git clone -b "$GIT_BRANCH" "$GIT_REPOSITORY" "${mountPath}/src" || (mkdir -p "${mountPath}" && echo "clone failed, starting with an empty workspace")`,
  ].join('; ');

  return {
    name: 'git-clone',
    image,
    command: ['sh', '-c', script],
    env: { GIT_BRANCH: source.branch, GIT_REPOSITORY: source.url },
    resources: containerResources(
      Math.min(INIT_CPU_LIMIT_MILLICORES, quota.cpuMillicores),
      Math.min(INIT_MEMORY_LIMIT_BYTES, quota.memoryBytes)
    ),
  };
}

/**
 * Builds the ordered resource set for one environment.
 *
 * Pure and deterministic: the same inputs always produce the same names,
 * order and content. Fails only when the identity yields no usable slug
 * or a port is out of range.
 */
export function buildManifests(
  template: ManifestTemplate,
  identity: EnvironmentIdentity,
  quota: QuotaPolicy,
  options: ManifestOptions
): Result<Manifest, EnvironmentError> {
  const slug = slugify(identity.name);
  if (!slug) {
    return err(EnvironmentErrors.MANIFEST_INVALID(identity.name, 'name yields an empty slug'));
  }

  const ports = options.ports ?? (template.ports.length > 0 ? template.ports : [options.containerPort]);
  const invalidPort = ports.find((port) => !isValidPort(port));
  if (ports.length === 0 || invalidPort !== undefined) {
    return err(
      EnvironmentErrors.MANIFEST_INVALID(identity.name, `invalid port ${String(invalidPort)}`)
    );
  }
  const primaryPort = ports[0];

  const names = resourceNames(slug);
  const namespace = names.namespace;
  const host = `${slug}.${options.ingressDomain}`;

  const selector = { app: names.workload, component: 'ide' };
  const labels = {
    ...selector,
    [MANAGED_LABELS.managed]: 'true',
    [MANAGED_LABELS.environmentId]: toLabelValue(identity.environmentId),
    [MANAGED_LABELS.userId]: toLabelValue(identity.userId),
    [MANAGED_LABELS.templateId]: toLabelValue(template.id),
  };

  const env = sortedRecord({
    ...template.env,
    ...options.env,
    ENVIRONMENT_ID: identity.environmentId,
    TEMPLATE_NAME: template.name,
    USER_ID: identity.userId,
  });

  const specs: ResourceSpec[] = [
    { kind: 'namespace', namespace, name: namespace, labels },
    { kind: 'quota', namespace, name: names.quota, labels, hard: buildQuotaHard(quota) },
    {
      kind: 'volume',
      namespace,
      name: names.volume,
      labels,
      storage: formatBytes(quota.storageBytes),
      storageClassName: options.storageClassName,
    },
    {
      kind: 'workload',
      namespace,
      name: names.workload,
      labels,
      replicas: 1,
      image: template.image,
      ports,
      env,
      resources: containerResources(quota.cpuMillicores, quota.memoryBytes),
      selector,
      volumeClaimName: names.volume,
      mountPath: options.workspaceMountPath,
      init: options.gitSource
        ? gitCloneStep(options.gitSource, options.gitInitImage, options.workspaceMountPath, quota)
        : undefined,
    },
    {
      kind: 'service',
      namespace,
      name: names.service,
      labels,
      port: primaryPort,
      targetPort: primaryPort,
      selector,
    },
    {
      kind: 'ingress',
      namespace,
      name: names.ingress,
      labels,
      host,
      path: '/',
      serviceName: names.service,
      servicePort: primaryPort,
      ingressClassName: options.ingressClassName,
    },
  ];

  return ok({ slug, namespace, host, accessUrl: `http://${host}`, specs });
}
