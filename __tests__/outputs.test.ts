import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AuthorSet } from '@/author-set';
import { publishReleaseNotes, writeReleaseNotesFile } from '@/outputs';
import type { ReleaseNotes } from '@/types';
import { endGroup, info, setOutput, startGroup } from '@actions/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

function createReleaseNotes(overrides: Partial<ReleaseNotes> = {}): ReleaseNotes {
  return {
    window: { baseRef: 'v1.0.0', headRef: 'main' },
    groupedCommits: new Map(),
    authorsInWindow: new AuthorSet(['octocat', 'newbie', 'dependabot[bot]']),
    authorsBeforeWindow: new AuthorSet(['octocat']),
    newAuthors: new AuthorSet(['newbie', 'dependabot[bot]']),
    historyTruncated: false,
    body: "## 🗺️ What's Changed",
    fullChangelogUrl: 'https://github.com/octo-org/octo-repo/compare/v1.0.0...main',
    ...overrides,
  };
}

describe('outputs', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'release-notes-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('writeReleaseNotesFile()', () => {
    it('should create missing directories and end the file with a newline', async () => {
      const outputFile = join(tempDir, 'notes', 'nested', 'RELEASE.md');

      await expect(writeReleaseNotesFile(outputFile, '# Notes')).resolves.toBe(outputFile);
      await expect(readFile(outputFile, 'utf8')).resolves.toBe('# Notes\n');
    });

    it('should overwrite an existing file', async () => {
      const outputFile = join(tempDir, 'RELEASE.md');
      await writeFile(outputFile, 'old notes that are longer', 'utf8');

      await writeReleaseNotesFile(outputFile, 'new');

      await expect(readFile(outputFile, 'utf8')).resolves.toBe('new\n');
    });

    it('should report the path that could not be written', async () => {
      const blocker = join(tempDir, 'blocker');
      await writeFile(blocker, '', 'utf8');
      const outputFile = join(blocker, 'RELEASE.md');

      await expect(writeReleaseNotesFile(outputFile, 'body')).rejects.toThrow(
        `Failed to write release notes to ${outputFile}: `,
      );
    });
  });

  describe('publishReleaseNotes()', () => {
    it('should log the notes and set every output', async () => {
      await publishReleaseNotes(createReleaseNotes(), { outputFile: '', githubOutput: true, outputName: 'changelog' });

      expect(startGroup).toHaveBeenCalledWith('Release Notes');
      expect(info).toHaveBeenCalledWith("## 🗺️ What's Changed");
      expect(endGroup).toHaveBeenCalledOnce();
      expect(vi.mocked(setOutput).mock.calls).toEqual([
        ['changelog', "## 🗺️ What's Changed"],
        ['base-ref', 'v1.0.0'],
        ['head-ref', 'main'],
        ['new-contributors', '["newbie"]'],
      ]);
    });

    it('should use the configured output name', async () => {
      await publishReleaseNotes(createReleaseNotes(), { outputFile: '', githubOutput: true, outputName: 'notes' });

      expect(setOutput).toHaveBeenCalledWith('notes', "## 🗺️ What's Changed");
      expect(setOutput).not.toHaveBeenCalledWith('changelog', expect.anything());
    });

    it('should skip the notes output when disabled', async () => {
      await publishReleaseNotes(createReleaseNotes({ window: { baseRef: null, headRef: 'main' } }), {
        outputFile: '',
        githubOutput: false,
        outputName: 'changelog',
      });

      expect(vi.mocked(setOutput).mock.calls).toEqual([
        ['base-ref', ''],
        ['head-ref', 'main'],
        ['new-contributors', '["newbie"]'],
      ]);
    });

    it('should write the notes to the output file', async () => {
      const outputFile = join(tempDir, 'RELEASE.md');

      await publishReleaseNotes(createReleaseNotes(), { outputFile, githubOutput: false, outputName: 'changelog' });

      await expect(readFile(outputFile, 'utf8')).resolves.toBe("## 🗺️ What's Changed\n");
      expect(info).toHaveBeenCalledWith(`Release notes written to ${outputFile}`);
    });
  });
});
