import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { buildManifests, buildQuotaHard } from '../manifest-builder.js';
import { MAX_SLUG_LENGTH, namespaceFor, resourceNames, slugify } from '../naming.js';
import type { ManifestOptions, ResourceSpec, WorkloadSpec } from '../types.js';

const GIB = 1024 ** 3;

const quota = {
  cpuMillicores: 1000,
  memoryBytes: 2 * GIB,
  storageBytes: 10 * GIB,
  maxPods: 5,
  maxServices: 5,
};

const template = {
  id: 'tpl-1',
  name: 'node-react',
  image: 'node:20-alpine',
  env: { NODE_ENV: 'development' },
  ports: [],
};

const identity = { environmentId: 'env-id-1', userId: 'user-1', name: 'Alice Smith' };

const options: ManifestOptions = {
  ingressDomain: 'sandbox.test',
  containerPort: 8080,
  gitInitImage: 'alpine/git:latest',
  workspaceMountPath: '/workspace',
};

const isWorkload = (spec: ResourceSpec): spec is WorkloadSpec => spec.kind === 'workload';

describe('naming', () => {
  it('slugifies identities into DNS labels', () => {
    expect(slugify('Alice Smith!')).toBe('alice-smith');
    expect(slugify('--Team__A--')).toBe('team-a');
    expect(slugify('!!!')).toBe('');
  });

  it('caps the slug so every prefixed name fits a label', () => {
    const slug = slugify('a'.repeat(100));

    expect(slug).toHaveLength(MAX_SLUG_LENGTH);
    expect(resourceNames(slug).quota.length).toBeLessThanOrEqual(63);
  });

  it('derives every resource name from the slug', () => {
    expect(resourceNames('alice')).toEqual({
      namespace: 'env-alice',
      quota: 'quota-alice',
      volume: 'pvc-alice',
      workload: 'ide-alice',
      service: 'svc-alice',
      ingress: 'ing-alice',
    });
    expect(namespaceFor('Alice')).toBe('env-alice');
  });
});

describe('buildQuotaHard', () => {
  it('maps the policy onto quota entries', () => {
    expect(buildQuotaHard(quota)).toEqual({
      'limits.cpu': '1000m',
      'limits.memory': '2Gi',
      'requests.cpu': '500m',
      'requests.memory': '1Gi',
      'requests.storage': '10Gi',
      pods: '5',
      services: '5',
      persistentvolumeclaims: '3',
      secrets: '10',
      configmaps: '10',
    });
  });
});

describe('buildManifests', () => {
  it('produces the resources in submission order', () => {
    const result = buildManifests(template, identity, quota, options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.specs.map((spec) => `${spec.kind}/${spec.name}`)).toEqual([
      'namespace/env-alice-smith',
      'quota/quota-alice-smith',
      'volume/pvc-alice-smith',
      'workload/ide-alice-smith',
      'service/svc-alice-smith',
      'ingress/ing-alice-smith',
    ]);
    expect(result.value.host).toBe('alice-smith.sandbox.test');
    expect(result.value.accessUrl).toBe('http://alice-smith.sandbox.test');
    expect(result.value.specs.every((spec) => spec.namespace === 'env-alice-smith')).toBe(true);
  });

  it('is deterministic for the same inputs', () => {
    expect(buildManifests(template, identity, quota, options)).toEqual(
      buildManifests(template, identity, quota, options)
    );
  });

  it('labels every object as managed', () => {
    const result = buildManifests(template, identity, quota, options);
    if (!result.ok) throw new Error('build failed');

    const [namespace] = result.value.specs;
    expect(namespace?.labels['sandbox-orchestrator.io/managed']).toBe('true');
    expect(namespace?.labels['sandbox-orchestrator.io/environment-id']).toBe('env-id-1');
  });

  it('falls back to the container port and merges environment variables', () => {
    const result = buildManifests(template, identity, quota, {
      ...options,
      env: { DEBUG: '1' },
    });
    if (!result.ok) throw new Error('build failed');

    const workload = result.value.specs.find(isWorkload);
    expect(workload?.ports).toEqual([8080]);
    expect(workload?.init).toBeUndefined();
    expect(workload?.env).toEqual({
      DEBUG: '1',
      ENVIRONMENT_ID: 'env-id-1',
      NODE_ENV: 'development',
      TEMPLATE_NAME: 'node-react',
      USER_ID: 'user-1',
    });
  });

  it('adds a clone step when a repository is given', () => {
    const result = buildManifests(template, identity, quota, {
      ...options,
      ports: [3000, 9229],
      gitSource: { url: 'https://git.example.com/team/app.git', branch: 'develop' },
    });
    if (!result.ok) throw new Error('build failed');

    const workload = result.value.specs.find(isWorkload);
    expect(workload?.ports).toEqual([3000, 9229]);
    expect(workload?.init?.image).toBe('alpine/git:latest');
    expect(workload?.init?.env).toEqual({
      GIT_BRANCH: 'develop',
      GIT_REPOSITORY: 'https://git.example.com/team/app.git',
    });
    expect(workload?.init?.resources.limits).toEqual({ cpu: '250m', memory: '256Mi' });
    expect(workload?.init?.command).toEqual([
      'sh',
      '-c',
      'if [ -d "/workspace/src/.git" ]; then exit 0; fi; ' +
        'git clone -b "$GIT_BRANCH" "$GIT_REPOSITORY" "/workspace/src" ' +
        '|| (mkdir -p "/workspace" && echo "clone failed, starting with an empty workspace")',
    ]);
  });

  it.skipIf(!existsSync('/bin/sh'))('emits a clone script the shell can parse', () => {
    const result = buildManifests(template, identity, quota, {
      ...options,
      gitSource: { url: 'https://git.example.com/team/app.git', branch: 'main' },
    });
    if (!result.ok) throw new Error('build failed');

    const script = result.value.specs.find(isWorkload)?.init?.command[2] ?? '';
    const check = spawnSync('/bin/sh', ['-n', '-c', script], { encoding: 'utf8' });

    expect(check.stderr).toBe('');
    expect(check.status).toBe(0);
  });

  it('rejects an identity without a usable slug', () => {
    const result = buildManifests(template, { ...identity, name: '???' }, quota, options);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('MANIFEST_INVALID');
  });

  it('rejects an out-of-range port', () => {
    const result = buildManifests(template, identity, quota, { ...options, ports: [80, 70000] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Cannot build manifests for "Alice Smith": invalid port 70000');
  });
});
