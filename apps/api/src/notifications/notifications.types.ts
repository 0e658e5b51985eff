export type NotificationConfigType = 'ado' | 'github_issues' | 'teams';

/**
 * Encrypted credential envelope. The ciphertext is produced by
 * common/utils/secret-data.util and is never template content.
 */
export interface SecretData {
  encrypted: string;
}

export interface AdoDuplicateTemplate {
  increment: string[];
  setState: Record<string, string>;
  adoFields: Record<string, string>;
  comment?: string;
  regressionIgnoreStates?: string[];
}

/**
 * Azure DevOps work-item notification
 */
export interface AdoTemplate {
  type: 'ado';
  baseUrl: string;
  authToken: SecretData;
  project: string;
  /** Work item type, e.g. "Bug" */
  workItemType: string;
  uniqueFields: string[];
  comment?: string;
  adoFields: Record<string, string>;
  adoDuplicateFields?: Record<string, string>;
  onDuplicate: AdoDuplicateTemplate;
}

export type GithubIssueSearchField = 'title' | 'body';

export interface GithubIssueSearch {
  fieldMatch: GithubIssueSearchField[];
  string: string;
  author?: string;
}

export interface GithubIssueDuplicate {
  comment?: string;
  labels: string[];
  reopen: boolean;
}

/**
 * GitHub issue notification
 */
export interface GithubIssuesTemplate {
  type: 'github_issues';
  /** Encrypted JSON of `{ user, personalAccessToken }` */
  auth: SecretData;
  organization: string;
  repository: string;
  title: string;
  body: string;
  uniqueSearch: GithubIssueSearch;
  assignees: string[];
  labels: string[];
  onDuplicate: GithubIssueDuplicate;
}

/**
 * Microsoft Teams incoming-webhook notification. Carries no template text.
 */
export interface TeamsTemplate {
  type: 'teams';
  url: SecretData;
}

export type NotificationConfig = AdoTemplate | GithubIssuesTemplate | TeamsTemplate;

export interface NotificationRecord {
  id: string;
  container: string;
  config: NotificationConfig;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type NotificationUpdateResult =
  | { status: 'updated'; record: NotificationRecord }
  | { status: 'version_conflict'; currentVersion: number }
  | { status: 'not_found' };

export const NOTIFICATION_CREATED_EVENT = 'notification.created';
export const NOTIFICATION_DELETED_EVENT = 'notification.deleted';

export class NotificationCreatedEvent {
  constructor(public readonly record: NotificationRecord) {}

  get notificationId(): string {
    return this.record.id;
  }

  get container(): string {
    return this.record.container;
  }
}

export class NotificationDeletedEvent {
  constructor(
    public readonly notificationId: string,
    public readonly container: string,
  ) {}
}
