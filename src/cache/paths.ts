import { JobIdentity } from './types';

const UNSAFE_CHARACTERS = /[^A-Za-z0-9._-]+/g;

export function sanitizeSegment(value: string): string {
  return value.replace(UNSAFE_CHARACTERS, '');
}

/**
 * Remote object path for a cache archive:
 * /<repository>/<branch or group>/<slug><ext>
 *
 * Absent (or fully sanitized away) segments are left out, so the path
 * never contains an empty segment.
 */
export function prefixed(
  repositoryId: string,
  branch: string | undefined,
  slug: string | undefined,
  ext: string
): string {
  const segments = [repositoryId, branch, slug]
    .filter((segment): segment is string => segment !== undefined)
    .map(sanitizeSegment)
    .filter(segment => segment.length > 0);

  return `/${segments.join('/')}${ext}`;
}

/**
 * Cache group: `PR.<number>` for pull requests, the branch otherwise
 */
export function group(job: JobIdentity): string {
  return job.pullRequest ? `PR.${job.pullRequest}` : job.branch;
}

/**
 * Branches to try when fetching, most specific first
 */
export function fallbackBranches(job: JobIdentity): string[] {
  const branches = [group(job)];

  if (job.pullRequest) {
    branches.push(job.branch);
  }
  if (job.branch !== job.defaultBranch) {
    branches.push(job.defaultBranch);
  }

  return branches;
}
