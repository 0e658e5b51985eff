import type {
  AdoDuplicateTemplate,
  AdoTemplate,
  GithubIssueDuplicate,
  GithubIssueSearch,
  GithubIssuesTemplate,
  NotificationConfig,
} from '../notifications/notifications.types';

/**
 * Position of one template string inside a notification config. `path` is
 * the chain of object keys leading to the field (or to the map / list that
 * holds it).
 */
export type FieldLocator =
  | { kind: 'scalar'; path: readonly string[] }
  | { kind: 'mapEntry'; path: readonly string[]; key: string }
  | { kind: 'listItem'; path: readonly string[]; index: number };

export interface TemplateField {
  locator: FieldLocator;
  value: string;
}

/**
 * Raised when a stored config cannot be walked or rebuilt: an unknown
 * variant, a template field that is not a string, or an update aimed at a
 * field the variant does not declare.
 */
export class MalformedConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedConfigError';
  }
}

type FieldVisitor = (locator: FieldLocator, value: string) => string;

export function formatLocator(locator: FieldLocator): string {
  const base = locator.path.join('.');
  switch (locator.kind) {
    case 'scalar':
      return base;
    case 'mapEntry':
      return `${base}[${JSON.stringify(locator.key)}]`;
    case 'listItem':
      return `${base}[${locator.index}]`;
  }
}

/**
 * Lists every template string of `config` in a stable order.
 * Variants without template text yield an empty list.
 */
export function extractTemplateFields(config: NotificationConfig): TemplateField[] {
  const fields: TemplateField[] = [];
  mapTemplateFields(config, (locator, value) => {
    fields.push({ locator, value });
    return value;
  });
  return fields;
}

/**
 * Returns a copy of `config` with the located fields replaced. Everything
 * else (URLs, secrets, flags, map keys, list order) is carried over as is.
 * With no updates the input object itself is returned.
 */
export function rebuildConfig(
  config: NotificationConfig,
  updates: readonly TemplateField[],
): NotificationConfig {
  if (updates.length === 0) {
    return config;
  }

  const pending = new Map<string, string>();
  for (const update of updates) {
    const key = formatLocator(update.locator);
    if (pending.has(key)) {
      throw new MalformedConfigError(`Duplicate update for field ${key}`);
    }
    pending.set(key, update.value);
  }

  const rebuilt = mapTemplateFields(config, (locator, value) => {
    const key = formatLocator(locator);
    const replacement = pending.get(key);
    if (replacement === undefined) {
      return value;
    }
    pending.delete(key);
    return replacement;
  });

  if (pending.size > 0) {
    throw new MalformedConfigError(
      `Fields not declared for ${config.type} config: ${[...pending.keys()].join(', ')}`,
    );
  }

  return rebuilt;
}

/**
 * The per-variant field enumeration. A new variant must add a case here;
 * the `never` default makes the compiler flag a missing one.
 */
function mapTemplateFields(config: NotificationConfig, visit: FieldVisitor): NotificationConfig {
  switch (config.type) {
    case 'ado':
      return mapAdoTemplate(config, visit);
    case 'github_issues':
      return mapGithubIssuesTemplate(config, visit);
    case 'teams':
      // Webhook URL only; nothing to rewrite.
      return config;
    default:
      return assertNever(config);
  }
}

function mapAdoTemplate(config: AdoTemplate, visit: FieldVisitor): AdoTemplate {
  const result: AdoTemplate = {
    ...config,
    project: text(visit, ['project'], config.project),
    workItemType: text(visit, ['workItemType'], config.workItemType),
    adoFields: textMap(visit, ['adoFields'], config.adoFields),
  };
  if (config.comment !== undefined) {
    result.comment = text(visit, ['comment'], config.comment);
  }

  const onDuplicate: AdoDuplicateTemplate = {
    ...config.onDuplicate,
    adoFields: textMap(visit, ['onDuplicate', 'adoFields'], config.onDuplicate.adoFields),
  };
  if (config.onDuplicate.comment !== undefined) {
    onDuplicate.comment = text(visit, ['onDuplicate', 'comment'], config.onDuplicate.comment);
  }
  result.onDuplicate = onDuplicate;

  return result;
}

function mapGithubIssuesTemplate(
  config: GithubIssuesTemplate,
  visit: FieldVisitor,
): GithubIssuesTemplate {
  const organization = text(visit, ['organization'], config.organization);
  const repository = text(visit, ['repository'], config.repository);
  const title = text(visit, ['title'], config.title);
  const body = text(visit, ['body'], config.body);

  const uniqueSearch: GithubIssueSearch = {
    ...config.uniqueSearch,
    string: text(visit, ['uniqueSearch', 'string'], config.uniqueSearch.string),
  };
  if (config.uniqueSearch.author !== undefined) {
    uniqueSearch.author = text(visit, ['uniqueSearch', 'author'], config.uniqueSearch.author);
  }

  const assignees = textList(visit, ['assignees'], config.assignees);
  const labels = textList(visit, ['labels'], config.labels);

  const onDuplicate: GithubIssueDuplicate = { ...config.onDuplicate };
  if (config.onDuplicate.comment !== undefined) {
    onDuplicate.comment = text(visit, ['onDuplicate', 'comment'], config.onDuplicate.comment);
  }
  onDuplicate.labels = textList(visit, ['onDuplicate', 'labels'], config.onDuplicate.labels);

  return {
    ...config,
    organization,
    repository,
    title,
    body,
    uniqueSearch,
    assignees,
    labels,
    onDuplicate,
  };
}

function text(visit: FieldVisitor, path: readonly string[], value: unknown): string {
  if (typeof value !== 'string') {
    throw new MalformedConfigError(`Template field ${path.join('.')} is not a string`);
  }
  return visit({ kind: 'scalar', path }, value);
}

function textMap(
  visit: FieldVisitor,
  path: readonly string[],
  values: unknown,
): Record<string, string> {
  if (typeof values !== 'object' || values === null || Array.isArray(values)) {
    throw new MalformedConfigError(`Template map ${path.join('.')} is not an object`);
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (typeof value !== 'string') {
      throw new MalformedConfigError(`Template field ${path.join('.')}[${JSON.stringify(key)}] is not a string`);
    }
    result[key] = visit({ kind: 'mapEntry', path, key }, value);
  }
  return result;
}

function textList(visit: FieldVisitor, path: readonly string[], values: unknown): string[] {
  if (!Array.isArray(values)) {
    throw new MalformedConfigError(`Template list ${path.join('.')} is not an array`);
  }

  return values.map((value: unknown, index) => {
    if (typeof value !== 'string') {
      throw new MalformedConfigError(`Template field ${path.join('.')}[${index}] is not a string`);
    }
    return visit({ kind: 'listItem', path, index }, value);
  });
}

function assertNever(config: never): never {
  const value: unknown = config;
  const type = typeof value === 'object' && value !== null && 'type' in value
    ? String(value.type)
    : String(value);
  throw new MalformedConfigError(`Unknown notification config type: ${type}`);
}
