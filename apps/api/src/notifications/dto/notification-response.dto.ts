import type {
  AdoTemplate,
  GithubIssuesTemplate,
  NotificationRecord,
  SecretData,
  TeamsTemplate,
} from '../notifications.types';

export const REDACTED = '[redacted]';

type Redacted<T> = {
  [K in keyof T]: T[K] extends SecretData ? typeof REDACTED : T[K];
};

export type RedactedNotificationConfig =
  | Redacted<AdoTemplate>
  | Redacted<GithubIssuesTemplate>
  | Redacted<TeamsTemplate>;

/**
 * Notification record as returned by the API, credentials replaced
 */
export interface NotificationResponse extends Omit<NotificationRecord, 'config'> {
  config: RedactedNotificationConfig;
}
