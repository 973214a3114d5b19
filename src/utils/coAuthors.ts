/** E-mail domain GitHub uses for private commit e-mail addresses */
export const GITHUB_NOREPLY_DOMAIN = 'users.noreply.github.com';

const CO_AUTHOR_TRAILER_REGEX =
  /^[ \t]*co-authored-by:[ \t]*(.*?)[ \t]*<([^>]*)>[ \t]*\r?$/gim;

/** A name that could be a GitHub login: a single word of login characters */
const LOGIN_LIKE_NAME_REGEX = /^[A-Za-z0-9_-]+$/;

/**
 * Formats a GitHub login as a mention
 */
export function formatLogin(login: string): string {
  return `@${login}`;
}

/**
 * Resolves a co-author to the identity shown in release notes
 *
 * Private GitHub e-mail addresses ("12345+octocat@users.noreply.github.com")
 * resolve to the login, as do names that look like a login. Anything else is
 * kept as the plain name.
 *
 * @param name Name part of the trailer
 * @param email E-mail part of the trailer
 */
export function resolveCoAuthorIdentity(name: string, email: string): string {
  const at = email.lastIndexOf('@');
  if (at > 0 && email.slice(at + 1).toLowerCase() === GITHUB_NOREPLY_DOMAIN) {
    const localPart = email.slice(0, at);
    const login = localPart.slice(localPart.indexOf('+') + 1);
    if (login) {
      return formatLogin(login);
    }
  }
  const trimmed = name.trim();
  if (LOGIN_LIKE_NAME_REGEX.test(trimmed)) {
    return formatLogin(trimmed);
  }
  return trimmed;
}

/**
 * Parses "Co-authored-by: Name <email>" trailers from a commit message
 *
 * @param message Full commit message
 * @returns Co-author identities in message order, not deduplicated
 */
export function parseCoAuthors(message: string): string[] {
  const coAuthors: string[] = [];
  for (const match of message.matchAll(CO_AUTHOR_TRAILER_REGEX)) {
    const identity = resolveCoAuthorIdentity(match[1], match[2]);
    if (identity) {
      coAuthors.push(identity);
    }
  }
  return coAuthors;
}
