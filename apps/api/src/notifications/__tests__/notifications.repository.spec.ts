import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../../database/database.service';
import { NotificationsRepository } from '../notifications.repository';
import { adoConfig, teamsConfig } from '../../../test/fixtures/notifications.fixture';

describe('NotificationsRepository', () => {
  let database: DatabaseService;
  let repository: NotificationsRepository;

  beforeEach(() => {
    database = new DatabaseService(new ConfigService({ database: { path: ':memory:' } }));
    database.onModuleInit();
    repository = new NotificationsRepository(database);
  });

  afterEach(() => {
    database.onModuleDestroy();
  });

  it('should insert at version 1 and read back the config', async () => {
    const inserted = await repository.insert({
      id: 'a',
      container: 'c-one',
      config: adoConfig({ project: 'P' }),
    });

    expect(inserted.version).toBe(1);
    await expect(repository.getById('a')).resolves.toEqual(inserted);
    await expect(repository.getById('missing')).resolves.toBeNull();
  });

  it('should list all records and filter by container', async () => {
    await repository.insert({ id: 'a', container: 'c-one', config: teamsConfig() });
    await repository.insert({ id: 'b', container: 'c-two', config: teamsConfig() });

    expect((await repository.listAll()).map((record) => record.id)).toEqual(['a', 'b']);
    expect((await repository.listByContainer('c-two')).map((record) => record.id)).toEqual(['b']);
  });

  it('should update when the version matches and bump it', async () => {
    const record = await repository.insert({ id: 'a', container: 'c-one', config: adoConfig() });

    const result = await repository.update(
      { ...record, config: adoConfig({ project: 'new' }) },
      1,
    );

    expect(result.status).toBe('updated');
    const stored = await repository.getById('a');
    expect(stored?.version).toBe(2);
    expect(stored?.config).toEqual(adoConfig({ project: 'new' }));
  });

  it('should report a version conflict without writing', async () => {
    const record = await repository.insert({ id: 'a', container: 'c-one', config: adoConfig() });
    await repository.update(record, 1);

    const result = await repository.update(
      { ...record, config: adoConfig({ project: 'stale' }) },
      1,
    );

    expect(result).toEqual({ status: 'version_conflict', currentVersion: 2 });
    expect((await repository.getById('a'))?.config).toEqual(adoConfig());
  });

  it('should report a missing record', async () => {
    const result = await repository.update(
      {
        id: 'gone',
        container: 'c-one',
        config: teamsConfig(),
        version: 1,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
      },
      1,
    );

    expect(result).toEqual({ status: 'not_found' });
  });

  it('should delete by id', async () => {
    await repository.insert({ id: 'a', container: 'c-one', config: teamsConfig() });

    await expect(repository.deleteById('a')).resolves.toBe(true);
    await expect(repository.deleteById('a')).resolves.toBe(false);
  });
});
