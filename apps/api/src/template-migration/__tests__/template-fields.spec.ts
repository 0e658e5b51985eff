import {
  extractTemplateFields,
  formatLocator,
  MalformedConfigError,
  rebuildConfig,
} from '../template-fields';
import type { NotificationConfig } from '../../notifications/notifications.types';
import {
  adoConfig,
  githubIssuesConfig,
  teamsConfig,
} from '../../../test/fixtures/notifications.fixture';

describe('template-fields', () => {
  const fullAdo = adoConfig({
    project: 'P',
    workItemType: 'Bug',
    adoFields: { 'System.Title': 't', 'System.AreaPath': 'a' },
    adoDuplicateFields: { 'System.Reason': 'dup' },
    comment: 'c',
    onDuplicate: {
      increment: ['Custom.Count'],
      setState: { Resolved: 'Active' },
      adoFields: { 'System.History': 'h' },
      comment: 'dc',
    },
  });

  const fullGithub = githubIssuesConfig({
    uniqueSearch: { fieldMatch: ['title', 'body'], string: 's', author: 'bot' },
    assignees: ['alice'],
    labels: ['bug', 'crash'],
    onDuplicate: { comment: 'again', labels: ['dup'], reopen: false },
  });

  describe('formatLocator', () => {
    it('should format each locator kind', () => {
      expect(formatLocator({ kind: 'scalar', path: ['onDuplicate', 'comment'] })).toBe(
        'onDuplicate.comment',
      );
      expect(formatLocator({ kind: 'mapEntry', path: ['adoFields'], key: 'System.Title' })).toBe(
        'adoFields["System.Title"]',
      );
      expect(formatLocator({ kind: 'listItem', path: ['labels'], index: 2 })).toBe('labels[2]');
    });
  });

  describe('extractTemplateFields', () => {
    it('should list every ADO template field in order', () => {
      const fields = extractTemplateFields(fullAdo);

      expect(fields.map((field) => formatLocator(field.locator))).toEqual([
        'project',
        'workItemType',
        'adoFields["System.Title"]',
        'adoFields["System.AreaPath"]',
        'comment',
        'onDuplicate.adoFields["System.History"]',
        'onDuplicate.comment',
      ]);
      expect(fields.map((field) => field.value)).toEqual(['P', 'Bug', 't', 'a', 'c', 'h', 'dc']);
    });

    it('should skip absent optional ADO fields', () => {
      const fields = extractTemplateFields(adoConfig());

      expect(fields.map((field) => formatLocator(field.locator))).toEqual([
        'project',
        'workItemType',
      ]);
    });

    it('should list every GitHub issues template field in order', () => {
      const fields = extractTemplateFields(fullGithub);

      expect(fields.map((field) => formatLocator(field.locator))).toEqual([
        'organization',
        'repository',
        'title',
        'body',
        'uniqueSearch.string',
        'uniqueSearch.author',
        'assignees[0]',
        'labels[0]',
        'labels[1]',
        'onDuplicate.comment',
        'onDuplicate.labels[0]',
      ]);
    });

    it('should yield nothing for teams', () => {
      expect(extractTemplateFields(teamsConfig())).toEqual([]);
    });

    it('should reject a non-string template field', () => {
      const config: NotificationConfig = JSON.parse(
        JSON.stringify({ ...adoConfig(), project: 42 }),
      );

      expect(() => extractTemplateFields(config)).toThrow(
        new MalformedConfigError('Template field project is not a string'),
      );
    });

    it('should reject a list that is not an array', () => {
      const config: NotificationConfig = JSON.parse(
        JSON.stringify({ ...githubIssuesConfig(), labels: 'bug' }),
      );

      expect(() => extractTemplateFields(config)).toThrow('Template list labels is not an array');
    });

    it('should reject an unknown variant', () => {
      const config: NotificationConfig = JSON.parse('{"type":"slack"}');

      expect(() => extractTemplateFields(config)).toThrow(
        'Unknown notification config type: slack',
      );
    });
  });

  describe('rebuildConfig', () => {
    it('should return the same object when there are no updates', () => {
      expect(rebuildConfig(fullAdo, [])).toBe(fullAdo);
    });

    it('should replace located fields and keep everything else', () => {
      const rebuilt = rebuildConfig(fullAdo, [
        { locator: { kind: 'scalar', path: ['project'] }, value: 'P2' },
        {
          locator: { kind: 'mapEntry', path: ['onDuplicate', 'adoFields'], key: 'System.History' },
          value: 'h2',
        },
      ]);

      expect(rebuilt).toEqual({
        ...fullAdo,
        project: 'P2',
        onDuplicate: { ...fullAdo.onDuplicate, adoFields: { 'System.History': 'h2' } },
      });
      expect(fullAdo.project).toBe('P');
      expect(fullAdo.onDuplicate.adoFields).toEqual({ 'System.History': 'h' });
    });

    it('should replace list items by index', () => {
      const rebuilt = rebuildConfig(fullGithub, [
        { locator: { kind: 'listItem', path: ['labels'], index: 1 }, value: 'fatal' },
      ]);

      expect(rebuilt).toEqual({ ...fullGithub, labels: ['bug', 'fatal'] });
    });

    it('should reject two updates for one field', () => {
      const locator = { kind: 'scalar', path: ['title'] } as const;

      expect(() =>
        rebuildConfig(fullGithub, [
          { locator, value: 'a' },
          { locator, value: 'b' },
        ]),
      ).toThrow('Duplicate update for field title');
    });

    it('should reject an update for a field the variant does not declare', () => {
      expect(() =>
        rebuildConfig(fullAdo, [{ locator: { kind: 'scalar', path: ['baseUrl'] }, value: 'x' }]),
      ).toThrow('Fields not declared for ado config: baseUrl');

      expect(() =>
        rebuildConfig(teamsConfig(), [{ locator: { kind: 'scalar', path: ['url'] }, value: 'x' }]),
      ).toThrow('Fields not declared for teams config: url');
    });
  });
});
