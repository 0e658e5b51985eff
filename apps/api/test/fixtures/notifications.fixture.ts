import type {
  AdoTemplate,
  GithubIssuesTemplate,
  NotificationConfig,
  NotificationRecord,
  TeamsTemplate,
} from '../../src/notifications/notifications.types';

/**
 * Notification config factories. Secrets hold placeholder envelopes; the
 * engine never opens them.
 */

export function adoConfig(overrides: Partial<AdoTemplate> = {}): AdoTemplate {
  return {
    type: 'ado',
    baseUrl: 'https://dev.azure.example.com/test-org',
    authToken: { encrypted: 'sealed-test-token' },
    project: '',
    workItemType: '',
    uniqueFields: ['System.Title'],
    adoFields: {},
    onDuplicate: {
      increment: [],
      setState: {},
      adoFields: {},
    },
    ...overrides,
  };
}

export function githubIssuesConfig(
  overrides: Partial<GithubIssuesTemplate> = {},
): GithubIssuesTemplate {
  return {
    type: 'github_issues',
    auth: { encrypted: 'sealed-test-auth' },
    organization: 'test-org',
    repository: 'test-repo',
    title: 'Crash report',
    body: 'A crash was found',
    uniqueSearch: {
      fieldMatch: ['title'],
      string: 'Crash report',
    },
    assignees: [],
    labels: [],
    onDuplicate: {
      labels: [],
      reopen: true,
    },
    ...overrides,
  };
}

export function teamsConfig(): TeamsTemplate {
  return {
    type: 'teams',
    url: { encrypted: 'sealed-test-webhook' },
  };
}

export function notificationRecord(
  id: string,
  config: NotificationConfig,
  version = 1,
): NotificationRecord {
  return {
    id,
    container: 'test-container',
    config,
    version,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}
