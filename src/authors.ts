import { AuthorSet } from '@/author-set';
import type { GitHubCommit } from '@/types';
import { BOT_MARKER, CO_AUTHORED_BY, UNKNOWN_AUTHOR } from '@/utils/constants';
import { splitLines, trimToNull } from '@/utils/string';

/**
 * Normalizes a git author string into a compact display identity.
 *
 * Anything from the first `<` on (the email part of `Name <email>`) is dropped and all whitespace is
 * removed, so `" John Doe <john@x.com> "` and `"John Doe<john@x.com>"` both become `"JohnDoe"`.
 *
 * @param {string} raw - The raw author value
 * @returns {string} The normalized identity, or `unknown` when nothing is left
 */
export function normalizeAuthorName(raw: string): string {
  const emailStart = raw.indexOf('<');
  const name = (emailStart === -1 ? raw : raw.slice(0, emailStart)).replace(/\s+/g, '').trim();

  return name === '' ? UNKNOWN_AUTHOR : name;
}

/**
 * Whether an identity belongs to an automated account (e.g. `dependabot[bot]`).
 */
export function isBot(identity: string): boolean {
  return identity.toLowerCase().includes(BOT_MARKER);
}

/**
 * Returns the identity primarily responsible for a commit.
 *
 * Linked GitHub logins are preferred over git names, and the author over the committer. Blank values
 * are skipped.
 *
 * @param {GitHubCommit} commit - The commit to inspect
 * @returns {string} The primary identity, or `unknown`
 */
export function getPrimaryAuthor(commit: GitHubCommit): string {
  for (const login of [commit.authorLogin, commit.committerLogin]) {
    const trimmed = trimToNull(login);
    if (trimmed !== null) {
      return trimmed;
    }
  }

  for (const name of [commit.authorName, commit.committerName]) {
    const trimmed = trimToNull(name);
    if (trimmed !== null) {
      return normalizeAuthorName(trimmed);
    }
  }

  return UNKNOWN_AUTHOR;
}

/**
 * Extracts the identities named in `Co-authored-by:` trailers. The trailer may be indented and is
 * matched case-insensitively.
 */
export function getCoAuthors(message: string): string[] {
  const prefix = CO_AUTHORED_BY.toLowerCase();

  return splitLines(message)
    .map((line) => line.trim())
    .filter((line) => line.toLowerCase().startsWith(prefix))
    .map((line) => normalizeAuthorName(line.slice(prefix.length)));
}

/**
 * Collects every identity credited for a commit: the primary author plus any co-authors.
 *
 * @param {GitHubCommit} commit - The commit to inspect
 * @returns {AuthorSet} The credited identities
 */
export function getCommitAuthors(commit: GitHubCommit): AuthorSet {
  const authors = new AuthorSet([getPrimaryAuthor(commit)]);
  authors.addAll(getCoAuthors(commit.message));

  return authors;
}
