import { isBot } from '@/authors';
import type { AuthorSet } from '@/author-set';
import type { CommitCategorizer } from '@/commit-categorizer';
import type { ClassifiedCommit } from '@/types';
import { CONTRIBUTIONS_HEADER, RELEASE_NOTES_HEADER } from '@/utils/constants';
import { formatMentions, getFirstLine } from '@/utils/string';

export interface FormatReleaseNotesOptions {
  owner: string;
  repo: string;
  fullChangelogUrl: string;

  /**
   * Everyone credited in the release window.
   */
  authors: AuthorSet;

  /**
   * Contributors whose first commit falls within the release window.
   */
  newAuthors: AuthorSet;
  groupedCommits: ReadonlyMap<string, readonly ClassifiedCommit[]>;
  categorizer: CommitCategorizer;
}

/**
 * Builds the link to the full list of changes in the release.
 *
 * @param {string} repoUrl - Base URL of the repository (e.g. https://github.com/octo-org/octo-repo)
 * @param {string | null} baseRef - The previous release ref, or `null` for a first release
 * @param {string} version - The version being released
 * @returns {string} A compare URL when a base exists, else the commit history URL for the version
 */
export function buildChangelogUrl(repoUrl: string, baseRef: string | null, version: string): string {
  return baseRef ? `${repoUrl}/compare/${baseRef}...${version}` : `${repoUrl}/commits/${version}`;
}

function formatSection(
  lines: string[],
  heading: string,
  commits: readonly ClassifiedCommit[],
  owner: string,
  repo: string,
): void {
  lines.push(heading);
  for (const { commit, authors } of commits) {
    lines.push(` * ${owner}/${repo}@${commit.sha} ${getFirstLine(commit.message)} ${formatMentions(authors, ' ')}`);
  }
  lines.push('');
}

/**
 * Renders the release notes Markdown document.
 *
 * Sections follow category priority, then `Other`, then any category name the categorizer doesn't
 * know. Empty sections are left out. Bots are listed on their own line instead of being thanked or
 * welcomed as new contributors.
 *
 * @param {FormatReleaseNotesOptions} options - Commits, contributors and link details
 * @returns {string} The Markdown document without trailing whitespace
 */
export function formatReleaseNotes({
  owner,
  repo,
  fullChangelogUrl,
  authors,
  newAuthors,
  groupedCommits,
  categorizer,
}: FormatReleaseNotesOptions): string {
  const lines: string[] = [RELEASE_NOTES_HEADER, ''];

  const groupsByName = new Map<string, { name: string; commits: readonly ClassifiedCommit[] }>();
  for (const [name, commits] of groupedCommits) {
    groupsByName.set(name.toLowerCase(), { name, commits });
  }

  const renderGroup = (name: string): void => {
    const group = groupsByName.get(name.toLowerCase());
    if (group && group.commits.length > 0) {
      formatSection(lines, `### ${categorizer.getEmoji(group.name)} ${group.name}`, group.commits, owner, repo);
    }
  };

  for (const { name } of categorizer.categories) {
    renderGroup(name);
  }

  const otherName = categorizer.otherCategory.name.toLowerCase();
  renderGroup(otherName);

  // Categories produced outside of the configured ones come last, in the order they were grouped.
  for (const [key, { name }] of groupsByName) {
    if (key !== otherName && !categorizer.isKnownCategory(name)) {
      renderGroup(name);
    }
  }

  lines.push(`🔗 **Full Changelog**: ${fullChangelogUrl}`, '');

  const bots = authors.filter(isBot);
  const newContributors = newAuthors.filter((author) => !isBot(author));
  const contributors = authors.filter((author) => !isBot(author));

  lines.push(CONTRIBUTIONS_HEADER);
  if (newContributors.size > 0) {
    lines.push(`🌱 New contributors since the last release: ${formatMentions(newContributors, ', ')}`);
  }
  if (contributors.size > 0) {
    lines.push(`💖 Thanks to all the contributors: ${formatMentions(contributors, ', ')}`);
  }
  if (bots.size > 0) {
    lines.push('', `🤖 Automated services that contributed: ${formatMentions(bots, ', ')}`);
  }

  return lines.join('\n').trimEnd();
}
