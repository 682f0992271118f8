/**
 * Property-based tests for cache paths and batching
 */
import * as fc from 'fast-check';
import { fallbackBranches, prefixed, sanitizeSegment } from '../../src/cache/paths';
import { DirectoryCache } from '../../src/cache/directoryCache';
import { InstructionRecorder } from '../../src/shell/instructionRecorder';
import { ADD_DIR_MAX } from '../../src/constants';

jest.mock('@actions/core');

const optionalSegmentArb = fc.option(fc.string({ maxLength: 30 }), { nil: undefined });

describe('Directory Cache Fuzz Tests', () => {
  describe('prefixed', () => {
    it('only contains safe characters and single separators', () => {
      fc.assert(
        fc.property(fc.string(), optionalSegmentArb, optionalSegmentArb, (repo, branch, slug) => {
          const result = prefixed(repo, branch, slug, '.tgz');

          expect(result).toMatch(/^\/[A-Za-z0-9._/-]*\.tgz$/);
          expect(result).not.toContain('//');
          expect(result).not.toMatch(/.\/\.tgz$/);
        }),
        { numRuns: 500 }
      );
    });

    it('keeps already safe segments intact', () => {
      const safeArb = fc.stringMatching(/^[A-Za-z0-9._-]{1,20}$/);
      fc.assert(
        fc.property(safeArb, safeArb, safeArb, (repo, branch, slug) => {
          expect(prefixed(repo, branch, slug, '.tbz')).toBe(`/${repo}/${branch}/${slug}.tbz`);
        }),
        { numRuns: 300 }
      );
    });

    it('sanitizing is idempotent', () => {
      fc.assert(
        fc.property(fc.string(), value => {
          expect(sanitizeSegment(sanitizeSegment(value))).toBe(sanitizeSegment(value));
        }),
        { numRuns: 300 }
      );
    });
  });

  describe('fallbackBranches', () => {
    it('starts with the group and ends with the default branch', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }),
          fc.option(fc.nat().map(String), { nil: undefined }),
          fc.string({ minLength: 1 }),
          (branch, pullRequest, defaultBranch) => {
            const branches = fallbackBranches({ repositoryId: '1', branch, pullRequest, defaultBranch });

            expect(branches[0]).toBe(pullRequest ? `PR.${pullRequest}` : branch);
            expect(branches[branches.length - 1]).toBe(
              branches.length === 1 ? branches[0] : defaultBranch
            );
            expect(branches.length).toBeLessThanOrEqual(3);
          }
        ),
        { numRuns: 300 }
      );
    });
  });

  describe('add', () => {
    it('never passes more than ADD_DIR_MAX directories to one invocation', () => {
      fc.assert(
        fc.property(fc.array(fc.stringMatching(/^[a-z]{1,8}$/), { maxLength: 450 }), dirs => {
          const sh = new InstructionRecorder();
          const cache = new DirectoryCache(
            sh,
            {
              store: 's3',
              signatureVersion: '4',
              bucket: 'test-bucket',
              accessKeyId: 'test-key-id',
              secretAccessKey: 'test-secret',
              fetchTimeout: 600,
              pushTimeout: 3600,
              debug: false,
              useEdgeClient: false,
              directories: [],
              requestHeaders: false,
            },
            { repositoryId: '1', branch: 'main', defaultBranch: 'main' }
          );

          const batches = cache.add(dirs);

          expect(batches).toBe(Math.ceil(dirs.length / ADD_DIR_MAX));
          const passed = sh.instructions.map(instruction => {
            const invocation = instruction.kind === 'if' ? instruction.body[0] : undefined;
            if (invocation?.kind !== 'cmd') {
              throw new Error('expected a guarded command');
            }
            return invocation.text.split(' ').slice(2);
          });
          passed.forEach(batch => expect(batch.length).toBeLessThanOrEqual(ADD_DIR_MAX));
          expect(passed.flat()).toEqual(dirs);
        }),
        { numRuns: 100 }
      );
    });
  });
});
