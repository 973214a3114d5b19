import { arch, platform, release } from 'os';

import * as Sentry from '@sentry/node';

import { logger } from '../logger';
import { getPackageVersion } from './version';

/**
 * Initializes Sentry SDK if CHANGESET_NOTES_SENTRY_DSN is set
 */
export function initSentrySdk(): void {
  const sentryDsn = (process.env.CHANGESET_NOTES_SENTRY_DSN || '').trim();
  if (!sentryDsn.startsWith('http')) {
    logger.debug(
      'Not initializing Sentry SDK - no valid DSN found in environment or ' +
        'env files'
    );
    return;
  }

  logger.debug('Sentry DSN found in the environment, initializing the SDK');
  Sentry.init({
    dsn: sentryDsn,
    release: `changeset-notes@${getPackageVersion()}`,
    beforeSend: event => {
      event.server_name = undefined; // Server name might contain PII
      return event;
    },
  });

  Sentry.configureScope(scope => {
    scope.setTag('os-platform', platform());
    scope.setTag('os-arch', arch());
    scope.setTag('os-release', release());

    scope.setExtra('changeset-notes-version', getPackageVersion());
  });
}
