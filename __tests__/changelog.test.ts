import { AuthorSet } from '@/author-set';
import { buildChangelogUrl, formatReleaseNotes } from '@/changelog';
import { CommitCategorizer } from '@/commit-categorizer';
import { commitBy } from '@/tests/helpers/commits';
import type { ClassifiedCommit } from '@/types';
import { describe, expect, it } from 'vitest';

describe('changelog', () => {
  const categorizer = new CommitCategorizer();
  const fullChangelogUrl = 'https://github.com/octo-org/octo-repo/compare/v1.0.0...v1.1.0';

  describe('buildChangelogUrl()', () => {
    it('should link to the comparison when a base exists', () => {
      expect(buildChangelogUrl('https://github.com/octo-org/octo-repo', 'v1.0.0', 'v1.1.0')).toBe(fullChangelogUrl);
    });

    it('should link to the commit history for a first release', () => {
      expect(buildChangelogUrl('https://github.com/octo-org/octo-repo', null, 'v1.0.0')).toBe(
        'https://github.com/octo-org/octo-repo/commits/v1.0.0',
      );
    });
  });

  describe('formatReleaseNotes()', () => {
    it('should render sections, the changelog link and contributors', () => {
      const commits = [
        commitBy('octocat', 'feat: add button', 'abc123'),
        commitBy('hubot', 'fix: crash\n\nbody\nCo-authored-by: Jane Doe <jane@x.com>', 'def456'),
        commitBy('dependabot[bot]', 'bump lodash', 'aaa111'),
      ];
      const authors = new AuthorSet(['octocat', 'hubot', 'JaneDoe', 'dependabot[bot]']);

      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors,
        newAuthors: new AuthorSet(['JaneDoe', 'dependabot[bot]']),
        groupedCommits: categorizer.groupByCategory(commits),
        categorizer,
      });

      expect(body).toBe(
        [
          "## 🗺️ What's Changed",
          '',
          '### ✨ Features',
          ' * octo-org/octo-repo@abc123 feat: add button @octocat',
          '',
          '### 🐛 Fixes',
          ' * octo-org/octo-repo@def456 fix: crash @hubot @JaneDoe',
          '',
          '### 📦 Dependencies',
          ' * octo-org/octo-repo@aaa111 bump lodash @dependabot[bot]',
          '',
          `🔗 **Full Changelog**: ${fullChangelogUrl}`,
          '',
          '### 🙌 Contributions',
          '🌱 New contributors since the last release: @JaneDoe',
          '💖 Thanks to all the contributors: @hubot, @JaneDoe, @octocat',
          '',
          '🤖 Automated services that contributed: @dependabot[bot]',
        ].join('\n'),
      );
    });

    it('should leave out the bot line and new contributors when there are none', () => {
      const commits = [commitBy('octocat', 'docs: update guide', 'abc123')];

      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(['octocat']),
        newAuthors: new AuthorSet(),
        groupedCommits: categorizer.groupByCategory(commits),
        categorizer,
      });

      expect(body).toBe(
        [
          "## 🗺️ What's Changed",
          '',
          '### 📝 Documentation',
          ' * octo-org/octo-repo@abc123 docs: update guide @octocat',
          '',
          `🔗 **Full Changelog**: ${fullChangelogUrl}`,
          '',
          '### 🙌 Contributions',
          '💖 Thanks to all the contributors: @octocat',
        ].join('\n'),
      );
    });

    it('should render a release without commits', () => {
      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(),
        newAuthors: new AuthorSet(),
        groupedCommits: new Map(),
        categorizer,
      });

      expect(body).toBe(
        ["## 🗺️ What's Changed", '', `🔗 **Full Changelog**: ${fullChangelogUrl}`, '', '### 🙌 Contributions'].join(
          '\n',
        ),
      );
    });

    it('should not welcome bots as new contributors', () => {
      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(['renovate[bot]']),
        newAuthors: new AuthorSet(['renovate[bot]']),
        groupedCommits: new Map(),
        categorizer,
      });

      expect(body.split('\n').slice(-3)).toEqual([
        '### 🙌 Contributions',
        '',
        '🤖 Automated services that contributed: @renovate[bot]',
      ]);
    });

    it('should render Other after known categories and unexpected categories last', () => {
      const security: ClassifiedCommit = {
        ...categorizer.classify(commitBy('octocat', 'sec: rotate keys', 'aaa')),
        category: 'Security',
      };
      const other = categorizer.classify(commitBy('octocat', 'Merge branch main', 'bbb'));
      const feature = categorizer.classify(commitBy('octocat', 'feat: x', 'ccc'));

      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(['octocat']),
        newAuthors: new AuthorSet(),
        groupedCommits: new Map([
          ['Security', [security]],
          ['Other', [other]],
          ['Fixes', []],
          ['Features', [feature]],
        ]),
        categorizer,
      });

      const headings = body.split('\n').filter((line) => line.startsWith('### '));
      expect(headings).toEqual(['### ✨ Features', '### 📌 Other', '### 🔹 Security', '### 🙌 Contributions']);
    });

    it('should match configured categories case-insensitively and keep unexpected ones in grouping order', () => {
      const feature = categorizer.classify(commitBy('octocat', 'feat: x', 'aaa'));
      const security: ClassifiedCommit = { ...feature, category: 'Security' };
      const audit: ClassifiedCommit = { ...feature, category: 'Audit' };

      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(['octocat']),
        newAuthors: new AuthorSet(),
        groupedCommits: new Map([
          ['Security', [security]],
          ['features', [feature]],
          ['Audit', [audit]],
        ]),
        categorizer,
      });

      const headings = body.split('\n').filter((line) => line.startsWith('### '));
      expect(headings).toEqual(['### ✨ features', '### 🔹 Security', '### 🔹 Audit', '### 🙌 Contributions']);
    });

    it('should only use the first line of a commit message', () => {
      const commits = [commitBy('octocat', 'fix: crash\r\n\r\nLong explanation', 'abc123')];

      const body = formatReleaseNotes({
        owner: 'octo-org',
        repo: 'octo-repo',
        fullChangelogUrl,
        authors: new AuthorSet(['octocat']),
        newAuthors: new AuthorSet(),
        groupedCommits: categorizer.groupByCategory(commits),
        categorizer,
      });

      expect(body.split('\n')[3]).toBe(' * octo-org/octo-repo@abc123 fix: crash @octocat');
    });
  });
});
