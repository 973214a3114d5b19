import { logger } from '../logger';

import { extractCommitHashes } from './changeset';
import { ResolvedCommit } from './pullRequests';

export const MISSING_DESCRIPTION = 'No pull request description found.';
export const MISSING_INFORMATION = 'Could not retrieve information.';
const UNKNOWN_CONTRIBUTORS = 'unknown';

/**
 * Anything that can resolve commit hashes, see `PullRequestResolver`
 */
export interface CommitResolver {
  resolveCommit(hash: string): Promise<ResolvedCommit | null>;
}

/**
 * One commit's section in the release notes
 */
export interface ReleaseNoteEntry {
  hash: string;
  pullNumber?: number;
  contributors: string[];
  description: string;
}

/**
 * Lists everyone who contributed to a commit
 *
 * The commit author comes first, then the PR author and then the
 * co-authors. Each identity appears once; identities are compared as
 * plain strings.
 */
export function getContributors({ commit, pullRequest }: ResolvedCommit): string[] {
  const contributors = new Set<string>();
  for (const identity of [
    commit.author,
    pullRequest?.author,
    ...commit.coAuthors,
  ]) {
    if (identity) {
      contributors.add(identity);
    }
  }
  return [...contributors];
}

/**
 * Builds the release notes entry of a resolved commit
 */
export function toReleaseNoteEntry(resolved: ResolvedCommit): ReleaseNoteEntry {
  const body = resolved.pullRequest?.body?.replace(/\r\n/g, '\n').trimEnd();
  return {
    hash: resolved.commit.hash,
    pullNumber: resolved.pullRequest?.number,
    contributors: getContributors(resolved),
    description: body || MISSING_DESCRIPTION,
  };
}

/**
 * Renders a release notes entry, ending with a blank line
 *
 * @param hash Commit hash from the changeset
 * @param entry The entry, or null if the commit could not be resolved
 */
export function formatReleaseNoteEntry(
  hash: string,
  entry: ReleaseNoteEntry | null
): string {
  if (!entry) {
    return `Commit ${hash}: ${MISSING_INFORMATION}\n\n`;
  }
  const pr = entry.pullNumber !== undefined ? ` (PR #${entry.pullNumber})` : '';
  const contributors = entry.contributors.length
    ? entry.contributors.join(', ')
    : UNKNOWN_CONTRIBUTORS;
  return (
    `Commit ${entry.hash}${pr}:\n` +
    `Contributors: ${contributors}\n` +
    `${entry.description}\n\n`
  );
}

/**
 * Generates release notes for a changeset
 *
 * The changeset text is kept as is and followed by one entry per commit
 * hash found in it, in the order of the changeset lines. Commits are
 * resolved one after another.
 *
 * @param changesetText The changeset
 * @param resolver Resolves commit hashes to commits and pull requests
 */
export async function generateReleaseNotes(
  changesetText: string,
  resolver: CommitResolver
): Promise<string> {
  let releaseNotes = `${changesetText}\n\n`;
  const commits = extractCommitHashes(changesetText);
  logger.debug(`Found ${commits.length} commit(s) in the changeset`);

  for (const { hash, lineNumber } of commits) {
    logger.info(`Processing commit ${hash} (line ${lineNumber})...`);
    const resolved = await resolver.resolveCommit(hash);
    releaseNotes += formatReleaseNoteEntry(
      hash,
      resolved && toReleaseNoteEntry(resolved)
    );
  }
  return releaseNotes;
}
