/**
 * Matches a commit hash immediately followed by a colon, as written by
 * changeset tooling: "- 1a2b3c4: Fix the thing"
 */
const COMMIT_HASH_REGEX = /([0-9a-f]{7,40}):/;

/**
 * A commit referenced by a changeset line
 */
export interface ChangesetCommit {
  /** Abbreviated or full commit hash */
  hash: string;
  /** 1-based line number within the changeset */
  lineNumber: number;
}

/**
 * Extracts the commit hashes from changeset text, in document order
 *
 * Only the first hash on each line is taken. Lines without a hash are
 * skipped.
 *
 * @param changesetText Free-form changeset text
 */
export function extractCommitHashes(changesetText: string): ChangesetCommit[] {
  const commits: ChangesetCommit[] = [];
  changesetText.split(/\r?\n/).forEach((line, index) => {
    const match = COMMIT_HASH_REGEX.exec(line);
    if (match) {
      commits.push({ hash: match[1], lineNumber: index + 1 });
    }
  });
  return commits;
}
